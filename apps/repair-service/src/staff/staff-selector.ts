import { StaffMember } from '@repairflow/shared';

export const STAFF_SELECTOR = Symbol('STAFF_SELECTOR');

/** Returns a number in [0, 1). */
export type RandomSource = () => number;

/**
 * Chooses which eligible staff member receives an assignment. Callers always
 * pass a non-empty list.
 */
export interface StaffSelector {
  select(candidates: readonly StaffMember[]): StaffMember;
}

/** Every candidate is equally likely; current workload is not considered. */
export class UniformRandomStaffSelector implements StaffSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  select(candidates: readonly StaffMember[]): StaffMember {
    if (candidates.length === 0) {
      throw new RangeError('Cannot select from an empty candidate list');
    }
    const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1);
    return candidates[index];
  }
}
