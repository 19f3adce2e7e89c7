import { ConfigModule } from '@nestjs/config';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { DatabaseModule, RepairOrder, UserAccount } from '@repairflow/database';
import {
  StaffJobType,
  UserRole,
  VehicleBrand,
  VehicleColor,
  VehicleDetails,
  VehicleType,
} from '@repairflow/shared';
import { AssignmentModule } from '../assignment/assignment.module';
import { AuditModule } from '../audit/audit.module';
import { Clock, CLOCK, IdGenerator, ID_GENERATOR } from '../common/clock/clock';
import { CommonModule } from '../common/common.module';
import { FeedbackModule } from '../feedback/feedback.module';
import { FeesModule } from '../fees/fees.module';
import { LogsModule } from '../logs/logs.module';
import { OrdersModule } from '../orders/orders.module';
import { RepairRequestService } from '../orders/repair-request.service';
import { PersistenceModule } from '../persistence/persistence.module';
import { RollbackModule } from '../rollback/rollback.module';
import { RandomSource, STAFF_SELECTOR, UniformRandomStaffSelector } from '../staff/staff-selector';
import { VehicleService } from '../vehicles/vehicle.service';
import { VehiclesModule } from '../vehicles/vehicles.module';

/** Ids `id-0001`, `id-0002`, ... in call order. */
export class SequentialIdGenerator implements IdGenerator {
  private issued = 0;

  nextId(): string {
    this.issued += 1;
    return `id-${String(this.issued).padStart(4, '0')}`;
  }
}

/** Starts at 2024-03-01T08:00:00.000Z and advances one minute per call. */
export class SteppingClock implements Clock {
  private ticks = 0;

  now(): string {
    const millis = Date.UTC(2024, 2, 1, 8, 0, 0) + this.ticks * 60_000;
    this.ticks += 1;
    return new Date(millis).toISOString();
  }
}

export interface RepairTestingOptions {
  autoAssignOnCreate?: boolean;
  /** Feeds the staff selector; the default always picks the first candidate */
  random?: RandomSource;
}

export interface RepairTestContext {
  module: TestingModule;
  dataSource: DataSource;
  ids: SequentialIdGenerator;
  clock: SteppingClock;
}

/**
 * The full repair core on a fresh in-memory SQLite database with
 * deterministic ids, timestamps and staff selection.
 */
export async function createRepairTestingModule(
  options: RepairTestingOptions = {},
): Promise<RepairTestContext> {
  const ids = new SequentialIdGenerator();
  const clock = new SteppingClock();

  const module = await Test.createTestingModule({
    imports: [
      ConfigModule.forRoot({
        isGlobal: true,
        ignoreEnvFile: true,
        load: [
          () => ({
            DB_TYPE: 'better-sqlite3',
            DB_SQLITE_PATH: ':memory:',
            DB_SYNCHRONIZE: true,
            AUTO_ASSIGN_ON_CREATE: options.autoAssignOnCreate ?? false,
            AUDIT_QUERY_DEFAULT_LIMIT: 50,
          }),
        ],
      }),
      DatabaseModule,
      EventEmitterModule.forRoot({ wildcard: true, delimiter: '.' }),
      CommonModule,
      AuditModule,
      PersistenceModule,
      AssignmentModule,
      FeedbackModule,
      FeesModule,
      LogsModule,
      OrdersModule,
      RollbackModule,
      VehiclesModule,
    ],
  })
    .overrideProvider(CLOCK)
    .useValue(clock)
    .overrideProvider(ID_GENERATOR)
    .useValue(ids)
    .overrideProvider(STAFF_SELECTOR)
    .useValue(new UniformRandomStaffSelector(options.random ?? (() => 0)))
    .compile();

  // registers @OnEvent listeners
  await module.init();

  return { module, dataSource: module.get(DataSource), ids, clock };
}

export interface SeedUser {
  id: string;
  name?: string;
  role?: UserRole;
  jobType?: StaffJobType | null;
  hourlyRate?: number | null;
}

/** Writes accounts directly; user rows are not audited. */
export async function seedUsers(dataSource: DataSource, users: SeedUser[]): Promise<UserAccount[]> {
  const repository = dataSource.getRepository(UserAccount);
  return repository.save(
    users.map((user) =>
      repository.create({
        id: user.id,
        name: user.name ?? user.id,
        username: user.id,
        email: null,
        phone: null,
        address: null,
        discriminator: user.role ?? UserRole.STAFF,
        jobType: user.jobType ?? null,
        hourlyRate: user.hourlyRate ?? null,
      }),
    ),
  );
}

export const TEST_VEHICLE: VehicleDetails = {
  customerId: 'customer-1',
  licensePlate: 'TEST-001',
  brand: VehicleBrand.TOYOTA,
  model: 'Corolla',
  type: VehicleType.SEDAN,
  color: VehicleColor.SILVER,
  remarks: null,
};

/**
 * Registers a vehicle, files a request for it and converts the request.
 * On a fresh context this issues id-0001 (vehicle), id-0002 (request) and
 * id-0003 (order), and appends four audit entries.
 */
export async function openRepairOrder(
  module: TestingModule,
  requiredStaffType: StaffJobType,
  licensePlate = TEST_VEHICLE.licensePlate,
): Promise<RepairOrder> {
  const vehicle = await module
    .get(VehicleService)
    .registerVehicle({ ...TEST_VEHICLE, licensePlate });
  const requests = module.get(RepairRequestService);
  const request = await requests.createRequest(vehicle.id, vehicle.customerId, 'Rear bumper dented');
  return requests.convertToOrder({ requestId: request.id, requiredStaffType });
}
