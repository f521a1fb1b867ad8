import { TransactionState } from '../value-objects/TransactionState';

export interface IProfitCalculator {
    scan(prices: readonly number[]): TransactionState;
    maxProfit(prices: readonly number[]): number;
}
