/**
 * Running bounds of the two-transaction scan.
 *
 * buy1 / buy2 hold costs (lower is better), sell1 / sell2 hold profits
 * (higher is better). buy2 is the price of the second purchase net of the
 * profit already banked by the first one.
 */
export class TransactionState {
    constructor(
        public readonly buy1: number,
        public readonly sell1: number,
        public readonly buy2: number,
        public readonly sell2: number
    ) {}

    static initial(): TransactionState {
        // No purchase made yet: costs are unbounded, doing nothing earns 0
        return new TransactionState(Number.POSITIVE_INFINITY, 0, Number.POSITIVE_INFINITY, 0);
    }

    get maxProfit(): number {
        return this.sell2;
    }

    get hasPurchase(): boolean {
        return Number.isFinite(this.buy1);
    }
}
