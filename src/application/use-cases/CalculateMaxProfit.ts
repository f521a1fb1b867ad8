import { injectable, inject } from 'inversify';
import { IProfitCalculator } from '../../domain/interfaces/IProfitCalculator';
import { Logger } from '../../shared/logger/Logger';
import { TYPES } from '../../config/types';

export interface ProfitReport {
    days: number;
    maxProfit: number;
}

@injectable()
export class CalculateMaxProfit {
    private logger = Logger.getInstance();

    constructor(
        @inject(TYPES.IProfitCalculator) private readonly calculator: IProfitCalculator
    ) {}

    execute(prices: readonly number[]): ProfitReport {
        this.logger.debug(`Scanning ${prices.length} daily prices`);

        const state = this.calculator.scan(prices);
        if (!state.hasPurchase) {
            this.logger.debug('Empty price series, nothing to trade');
        } else {
            this.logger.debug('Scan finished', {
                buy1: state.buy1,
                sell1: state.sell1,
                buy2: state.buy2,
                sell2: state.sell2
            });
        }

        return {
            days: prices.length,
            maxProfit: state.maxProfit
        };
    }
}
