import { CalculatorConfig } from '../../config/calculator.config';

export type OutputWriter = (text: string) => void;

export const stdoutWriter: OutputWriter = text => {
    process.stdout.write(text);
};

export function formatResult(maxProfit: number): string {
    return `${CalculatorConfig.output.label}: ${maxProfit}\n`;
}
