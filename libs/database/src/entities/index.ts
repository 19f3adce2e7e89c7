import { RepairOrder } from './repair-order.entity';
import { RepairAssignment } from './repair-assignment.entity';
import { RepairLog } from './repair-log.entity';
import { Material } from './material.entity';
import { RepairRequest } from './repair-request.entity';
import { Vehicle } from './vehicle.entity';
import { UserAccount } from './user-account.entity';
import { AuditLogEntry } from './audit-log-entry.entity';
import { Feedback } from './feedback.entity';

export {
  RepairOrder,
  RepairAssignment,
  RepairLog,
  Material,
  RepairRequest,
  Vehicle,
  UserAccount,
  AuditLogEntry,
  Feedback,
};

export const REPAIR_ENTITIES = [
  RepairOrder,
  RepairAssignment,
  RepairLog,
  Material,
  RepairRequest,
  Vehicle,
  UserAccount,
  AuditLogEntry,
  Feedback,
];
