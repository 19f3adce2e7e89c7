// Enums
export * from './enums/repair-status.enum';
export * from './enums/staff-job-type.enum';
export * from './enums/audit-operation.enum';
export * from './enums/vehicle.enum';

// Core domain types
export * from './types/repair.types';
export * from './types/user.types';
export * from './types/audit.types';

// Event types
export * from './events/repair.events';

// Utilities
export * from './utils/date.utils';
export * from './utils/uuid.utils';
export * from './utils/money.utils';
