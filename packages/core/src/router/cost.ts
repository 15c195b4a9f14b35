export class CostTracker {
  private _spent = 0;
  private _calls = 0;

  get totalSpent(): number {
    return this._spent;
  }

  get totalCalls(): number {
    return this._calls;
  }

  addCost(cost: number): void {
    this._spent += cost;
    this._calls++;
  }

  /** Throws once spending has reached the budget. */
  checkBudget(maxCostUsd: number): void {
    if (this._spent >= maxCostUsd) {
      throw new BudgetExceededError(this._spent, maxCostUsd);
    }
  }
}

export class BudgetExceededError extends Error {
  constructor(
    public readonly spent: number,
    public readonly budget: number,
  ) {
    super(`Budget exceeded: spent $${spent.toFixed(4)} of $${budget.toFixed(2)} budget`);
    this.name = 'BudgetExceededError';
  }
}
