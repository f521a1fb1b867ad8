import { CalculatorConfig } from '../../config/calculator.config';
import { ProfitReport } from '../../application/use-cases/CalculateMaxProfit';
import { Logger } from '../../shared/logger/Logger';
import { runCalcCommand } from './CalcCommand';
import { OutputWriter } from './formatResult';

export function runDemoCommand(args: { output?: OutputWriter } = {}): ProfitReport {
    const logger = Logger.getInstance();
    const prices = CalculatorConfig.demo.prices;

    logger.debug(`Running demo on [${prices.join(', ')}]`);
    return runCalcCommand({ prices, output: args.output });
}
