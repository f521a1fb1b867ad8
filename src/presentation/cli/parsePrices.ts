import { CalculatorConfig } from '../../config/calculator.config';
import { InvalidPriceInputError } from '../../shared/errors/CliErrors';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses "3,3,5,0" into [3, 3, 5, 0]. Blank input is the empty series.
 * Positions in errors are 1-based.
 */
export function parsePrices(input: string): number[] {
    if (input.trim() === '') return [];

    return input.split(CalculatorConfig.cli.priceSeparator).map((raw, index) => {
        const token = raw.trim();
        if (!INTEGER_PATTERN.test(token)) {
            throw new InvalidPriceInputError(token, index + 1);
        }
        const value = Number(token);
        if (!Number.isSafeInteger(value)) {
            throw new InvalidPriceInputError(token, index + 1);
        }
        return value;
    });
}
