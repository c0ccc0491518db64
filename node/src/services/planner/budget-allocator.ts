// Fixed-proportion budget split. The parts are designed to sum to the total; rounding may
// leave a sub-cent gap, which is accepted.
import type { BudgetAllocation } from '@/types/itinerary';

/** Budgets that are missing, zero or negative are replaced by this floor. */
export const MIN_BUDGET_FLOOR = 1000;

export const BUDGET_SPLIT = {
  hotel: 0.6,
  activities: 0.25,
  transport: 0.15,
} as const;

export function roundCurrency(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function allocateBudget(total: number): BudgetAllocation {
  const budget = Number.isFinite(total) && total > 0 ? total : MIN_BUDGET_FLOOR;
  return {
    hotelTotal: roundCurrency(budget * BUDGET_SPLIT.hotel),
    activitiesTotal: roundCurrency(budget * BUDGET_SPLIT.activities),
    transportTotal: roundCurrency(budget * BUDGET_SPLIT.transport),
    total: roundCurrency(budget),
  };
}
