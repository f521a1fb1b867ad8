import { CalculatorConfig } from '../../config/calculator.config';
import { UnexpectedArgumentError, UnknownCommandError } from '../../shared/errors/CliErrors';
import { parsePrices } from './parsePrices';

export type CliCommand =
    | { command: 'demo'; verbose: boolean }
    | { command: 'calc'; verbose: boolean; prices: number[] };

function rejectExtra(command: string, extra: readonly string[]): void {
    if (extra.length > 0) {
        throw new UnexpectedArgumentError(command, extra[0]);
    }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
    const verbose = argv.includes(CalculatorConfig.cli.verboseFlag);
    const args = argv.filter(arg => arg !== CalculatorConfig.cli.verboseFlag);
    const mode = args[0] ?? CalculatorConfig.cli.defaultCommand;

    switch (mode) {
        case 'demo':
            rejectExtra(mode, args.slice(1));
            return { command: 'demo', verbose };
        case 'calc':
            rejectExtra(mode, args.slice(2));
            // `calc` with no list is the empty series
            return { command: 'calc', verbose, prices: parsePrices(args[1] ?? '') };
        default:
            throw new UnknownCommandError(mode);
    }
}
