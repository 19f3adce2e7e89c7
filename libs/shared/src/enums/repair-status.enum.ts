export enum RepairStatus {
  PENDING = 'Pending',
  IN_PROGRESS = 'In Progress',
  COMPLETED = 'Completed',
  CANCELLED = 'Cancelled'
}

export enum AssignmentStatus {
  PENDING = 'pending',
  ACCEPTED = 'accepted',
  REJECTED = 'rejected'
}

export enum RepairRequestStatus {
  PENDING = 'pending',
  ORDER_CREATED = 'order_created'
}

/** Order states no further transition may leave, short of an administrative rollback. */
export const TERMINAL_REPAIR_STATUSES: readonly RepairStatus[] = [
  RepairStatus.COMPLETED,
  RepairStatus.CANCELLED,
];

/** Assignment states that count as the order's live assignment. */
export const LIVE_ASSIGNMENT_STATUSES: readonly AssignmentStatus[] = [
  AssignmentStatus.PENDING,
  AssignmentStatus.ACCEPTED,
];
