import { createContainer } from '../../config/inversify.config';
import { CalculateMaxProfit, ProfitReport } from '../../application/use-cases/CalculateMaxProfit';
import { Logger } from '../../shared/logger/Logger';
import { formatResult, OutputWriter, stdoutWriter } from './formatResult';

export function runCalcCommand(args: {
    prices: readonly number[];
    output?: OutputWriter;
}): ProfitReport {
    const logger = Logger.getInstance();
    const container = createContainer();
    const write = args.output ?? stdoutWriter;

    try {
        const useCase = container.get<CalculateMaxProfit>(CalculateMaxProfit);
        const report = useCase.execute(args.prices);

        write(formatResult(report.maxProfit));
        return report;
    } catch (error) {
        logger.error('Profit calculation failed', error);
        throw error;
    }
}
