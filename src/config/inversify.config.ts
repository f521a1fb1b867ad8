import 'reflect-metadata';
import { Container } from 'inversify';
import { TYPES } from './types';

// Interfaces
import { IProfitCalculator } from '../domain/interfaces/IProfitCalculator';

// Implementations
import { TwoTransactionProfitCalculator } from '../application/services/profit/TwoTransactionProfitCalculator';
import { CalculateMaxProfit } from '../application/use-cases/CalculateMaxProfit';

export { TYPES };

export function createContainer(): Container {
    const container = new Container();

    // --- Core Services ---
    container.bind<IProfitCalculator>(TYPES.IProfitCalculator).to(TwoTransactionProfitCalculator).inSingletonScope();

    // --- Use Cases ---
    container.bind<CalculateMaxProfit>(CalculateMaxProfit).toSelf();

    return container;
}
