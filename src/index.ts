#!/usr/bin/env node
import 'reflect-metadata';
import { runDemoCommand } from './presentation/cli/DemoCommand';
import { runCalcCommand } from './presentation/cli/CalcCommand';
import { parseCliArgs } from './presentation/cli/parseCliArgs';
import { Logger, LogLevel } from './shared/logger/Logger';

export function main(argv: readonly string[]): void {
    const logger = Logger.getInstance();

    try {
        const cli = parseCliArgs(argv);
        if (cli.verbose) {
            logger.setLogLevel(LogLevel.DEBUG);
        }

        if (cli.command === 'calc') {
            logger.debug(`Calculating profit for ${cli.prices.length} prices...`);
            runCalcCommand({ prices: cli.prices });
        } else {
            runDemoCommand();
        }
    } catch (error) {
        logger.error('Application crashed', error);
        process.exit(1);
    }
}

if (require.main === module) {
    main(process.argv.slice(2));
}
