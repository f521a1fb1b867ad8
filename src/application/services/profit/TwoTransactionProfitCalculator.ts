import { injectable } from 'inversify';
import { IProfitCalculator } from '../../../domain/interfaces/IProfitCalculator';
import { TransactionState } from '../../../domain/value-objects/TransactionState';

/**
 * Best profit from at most two non-overlapping buy/sell transactions,
 * in a single forward pass.
 *
 * Selling and buying again on the same day is allowed, so the second
 * purchase may open on the day the first position is closed.
 */
@injectable()
export class TwoTransactionProfitCalculator implements IProfitCalculator {

    scan(prices: readonly number[]): TransactionState {
        const start = TransactionState.initial();
        let buy1 = start.buy1;
        let sell1 = start.sell1;
        let buy2 = start.buy2;
        let sell2 = start.sell2;

        // Order matters: buy2 must see the sell1 of the same day
        for (const price of prices) {
            buy1 = Math.min(buy1, price);
            sell1 = Math.max(sell1, price - buy1);
            buy2 = Math.min(buy2, price - sell1);
            sell2 = Math.max(sell2, price - buy2);
        }

        return new TransactionState(buy1, sell1, buy2, sell2);
    }

    maxProfit(prices: readonly number[]): number {
        return this.scan(prices).maxProfit;
    }
}
