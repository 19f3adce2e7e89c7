import { RepairStatus } from '../enums/repair-status.enum';
import { AuditOperation } from '../enums/audit-operation.enum';
import { StaffJobType } from '../enums/staff-job-type.enum';

export enum RepairEventType {
  ORDER_CREATED = 'repair.order.created',
  ORDER_CANCELLED = 'repair.order.cancelled',
  ORDER_COMPLETED = 'repair.order.completed',
  ASSIGNMENT_CREATED = 'repair.assignment.created',
  ASSIGNMENT_ACCEPTED = 'repair.assignment.accepted',
  ASSIGNMENT_REJECTED = 'repair.assignment.rejected',
  REASSIGNMENT_NEEDED = 'repair.order.reassignment-needed',
  ROLLBACK_APPLIED = 'audit.rollback.applied'
}

export interface RepairOrderCreatedEvent {
  orderId: string;
  vehicleId: string;
  customerId: string;
  requestId: string;
  requiredStaffType: StaffJobType;
}

export interface RepairOrderStatusEvent {
  orderId: string;
  previousStatus: RepairStatus;
  newStatus: RepairStatus;
  reason?: string;
}

export interface AssignmentEvent {
  assignmentId: string;
  orderId: string;
  staffId: string;
}

export interface AssignmentResponseEvent extends AssignmentEvent {
  accepted: boolean;
}

export interface ReassignmentNeededEvent {
  orderId: string;
  requiredStaffType: StaffJobType | null;
  excludeStaffId: string;
}

export interface RollbackAppliedEvent {
  tableName: string;
  recordId: string;
  reversedEntryId: number;
  appliedOperation: AuditOperation;
}
