import { StaffJobType } from '../enums/staff-job-type.enum';
import { VehicleBrand, VehicleColor, VehicleType } from '../enums/vehicle.enum';

export interface AssignmentTimeUpdate {
  assignmentId: string;
  timeWorked: number;
}

export interface MaterialLine {
  name: string;
  quantity: number;
  unitPrice: number;
  remarks?: string | null;
}

export interface OrderBill {
  orderId: string;
  materialFee: number;
  laborFee: number;
  total: number;
}

export interface ConvertRequestInput {
  requestId: string;
  requiredStaffType: StaffJobType;
  remarks?: string | null;
}

export interface VehicleDetails {
  customerId: string;
  licensePlate: string;
  brand: VehicleBrand;
  model: string;
  type: VehicleType;
  color: VehicleColor;
  remarks?: string | null;
}

export function materialTotalPrice(line: { quantity: number; unitPrice: number }): number {
  return line.quantity * line.unitPrice;
}
