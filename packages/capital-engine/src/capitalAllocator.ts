import {
  CapitalStateInvalidError,
  type AccountSnapshot,
  type StrategyBudget,
  type StrategyId,
} from '@signaldesk/core';

export interface CapitalAllocatorConfig {
  safetyBuffer: number;
}

export interface StrategyAllocation {
  id: StrategyId;
  allocation: number;
}

export interface CapitalPlan {
  usableCapital: number;
  safetyBuffer: number;
  budgets: StrategyBudget[];
}

const requireAmount = (value: number | null, field: string): number => {
  if (value === null || !Number.isFinite(value)) {
    throw new CapitalStateInvalidError(`Account ${field} is missing`, { field, value });
  }
  if (value < 0) {
    throw new CapitalStateInvalidError(`Account ${field} is negative`, { field, value });
  }
  return value;
};

/**
 * (buying power + gross position value) less the safety buffer.
 */
export const computeUsableCapital = (account: AccountSnapshot, safetyBuffer: number): number => {
  const buyingPower = requireAmount(account.buyingPower, 'buyingPower');
  const grossPositionValue = requireAmount(account.grossPositionValue, 'grossPositionValue');
  return (buyingPower + grossPositionValue) * (1 - safetyBuffer);
};

export class CapitalAllocator {
  constructor(private readonly config: CapitalAllocatorConfig) {
    if (!(config.safetyBuffer >= 0 && config.safetyBuffer < 1)) {
      throw new RangeError(`Safety buffer must be in [0, 1), got ${config.safetyBuffer}`);
    }
  }

  allocate(account: AccountSnapshot, strategies: readonly StrategyAllocation[]): CapitalPlan {
    const usableCapital = computeUsableCapital(account, this.config.safetyBuffer);
    const budgets = strategies.map((strategy) => ({
      strategyId: strategy.id,
      allocationPct: strategy.allocation,
      capital: usableCapital * strategy.allocation
    }));
    return { usableCapital, safetyBuffer: this.config.safetyBuffer, budgets };
  }
}
