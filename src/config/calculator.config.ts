/**
 * Calculator Configuration
 *
 * Demo series: two trades (0 -> 3, then 1 -> 4) give 6.
 */

export const CalculatorConfig = {
    demo: {
        prices: [3, 3, 5, 0, 0, 3, 1, 4]
    },

    output: {
        label: 'Maximum profit'
    },

    cli: {
        defaultCommand: 'demo',
        priceSeparator: ',',
        verboseFlag: '--verbose'
    }
} as const;
