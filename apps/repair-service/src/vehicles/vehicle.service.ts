import { Injectable, Logger } from '@nestjs/common';
import { Vehicle } from '@repairflow/database';
import { VehicleDetails } from '@repairflow/shared';
import { UnitOfWork } from '../persistence/unit-of-work.service';
import { VehicleRepository } from '../persistence/repositories/vehicle.repository';

export type VehicleChanges = Partial<Omit<VehicleDetails, 'customerId'>>;

@Injectable()
export class VehicleService {
  private readonly logger = new Logger(VehicleService.name);

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly vehicles: VehicleRepository,
  ) {}

  async registerVehicle(details: VehicleDetails): Promise<Vehicle> {
    const vehicle = await this.unitOfWork.run('registerVehicle', (manager) =>
      this.vehicles.createVehicle(manager, details),
    );
    this.logger.log(`Vehicle ${vehicle.id} registered`, {
      customerId: details.customerId,
      licensePlate: details.licensePlate,
    });
    return vehicle;
  }

  async getVehicle(vehicleId: string): Promise<Vehicle> {
    return this.unitOfWork.read('getVehicle', (manager) => this.vehicles.getById(vehicleId, manager));
  }

  async vehiclesForCustomer(customerId: string): Promise<Vehicle[]> {
    return this.unitOfWork.read('vehiclesForCustomer', (manager) =>
      this.vehicles.findByCustomer(customerId, manager),
    );
  }

  async updateVehicle(vehicleId: string, changes: VehicleChanges): Promise<Vehicle> {
    const vehicle = await this.unitOfWork.run('updateVehicle', (manager) =>
      this.vehicles.update(manager, vehicleId, changes),
    );
    this.logger.log(`Vehicle ${vehicleId} updated`, { fields: Object.keys(changes).join(',') });
    return vehicle;
  }

  async removeVehicle(vehicleId: string): Promise<Vehicle> {
    const vehicle = await this.unitOfWork.run('removeVehicle', (manager) =>
      this.vehicles.delete(manager, vehicleId),
    );
    this.logger.log(`Vehicle ${vehicleId} removed`, { customerId: vehicle.customerId });
    return vehicle;
  }
}
