import { TwoTransactionProfitCalculator } from '../../src/application/services/profit/TwoTransactionProfitCalculator';

// Reference answers by exhaustive search over buy/sell day pairs
function bestSingleTrade(prices: readonly number[]): number {
    let best = 0;
    for (let i = 0; i < prices.length; i++) {
        for (let j = i + 1; j < prices.length; j++) {
            best = Math.max(best, prices[j] - prices[i]);
        }
    }
    return best;
}

function bestTwoTrades(prices: readonly number[]): number {
    let best = 0;
    // Split point: first trade sells on or before day k, second buys on or after it
    for (let k = 0; k < prices.length; k++) {
        const left = bestSingleTrade(prices.slice(0, k + 1));
        const right = bestSingleTrade(prices.slice(k));
        best = Math.max(best, left + right);
    }
    return best;
}

function pseudoRandomSeries(seed: number, length: number): number[] {
    const series: number[] = [];
    let state = seed;
    for (let i = 0; i < length; i++) {
        state = (state * 48271) % 2147483647;
        series.push(state % 20);
    }
    return series;
}

const SCENARIOS: Array<[number[], number]> = [
    [[3, 3, 5, 0, 0, 3, 1, 4], 6],
    [[1, 2, 3, 4, 5], 4],
    [[7, 6, 4, 3, 1], 0],
    [[1], 0],
    [[], 0],
    [[1, 2, 4, 2, 5, 7, 2, 4, 9, 0], 13]
];

describe('TwoTransactionProfitCalculator', () => {
    const calculator = new TwoTransactionProfitCalculator();

    describe('maxProfit', () => {
        it.each(SCENARIOS)('returns the best two-trade profit for %j', (prices, expected) => {
            expect(calculator.maxProfit(prices)).toBe(expected);
        });

        it('returns 0 for a single day', () => {
            expect(calculator.maxProfit([42])).toBe(0);
            expect(calculator.maxProfit([0])).toBe(0);
        });

        it('returns 0 when prices never rise', () => {
            expect(calculator.maxProfit([9, 9, 9, 9])).toBe(0);
            expect(calculator.maxProfit([10, 8, 8, 3, 0])).toBe(0);
        });

        it('combines two separate rallies', () => {
            expect(calculator.maxProfit([1, 4, 2, 6])).toBe(7);
        });

        it('keeps only the two best rallies out of three', () => {
            // rallies of 2, 5 and 3
            expect(calculator.maxProfit([1, 3, 0, 5, 2, 5])).toBe(8);
        });

        it('allows selling and buying again on the same day', () => {
            expect(calculator.maxProfit([1, 3, 5])).toBe(4);
        });

        it('handles zero and negative prices', () => {
            expect(calculator.maxProfit([0, 0, 3])).toBe(3);
            expect(calculator.maxProfit([-3, -1, -4, 0])).toBe(6);
        });

        it('never does worse than a single trade', () => {
            for (let seed = 1; seed <= 25; seed++) {
                const prices = pseudoRandomSeries(seed, 12);
                expect(calculator.maxProfit(prices)).toBeGreaterThanOrEqual(bestSingleTrade(prices));
            }
        });

        it('matches exhaustive search', () => {
            for (let seed = 1; seed <= 25; seed++) {
                const prices = pseudoRandomSeries(seed, 10);
                expect(calculator.maxProfit(prices)).toBe(bestTwoTrades(prices));
            }
        });

        it('is pure', () => {
            const prices = [3, 3, 5, 0, 0, 3, 1, 4];
            const first = calculator.maxProfit(prices);
            const second = calculator.maxProfit(prices);

            expect(second).toBe(first);
            expect(prices).toEqual([3, 3, 5, 0, 0, 3, 1, 4]);
        });
    });

    describe('scan', () => {
        it('leaves the initial state untouched for an empty series', () => {
            const state = calculator.scan([]);

            expect(state.buy1).toBe(Number.POSITIVE_INFINITY);
            expect(state.sell1).toBe(0);
            expect(state.buy2).toBe(Number.POSITIVE_INFINITY);
            expect(state.sell2).toBe(0);
            expect(state.hasPurchase).toBe(false);
        });

        it('reports the final bounds', () => {
            const state = calculator.scan([3, 3, 5, 0, 0, 3, 1, 4]);

            expect(state.buy1).toBe(0);
            expect(state.sell1).toBe(4);
            expect(state.buy2).toBe(-2);
            expect(state.sell2).toBe(6);
            expect(state.maxProfit).toBe(6);
            expect(state.hasPurchase).toBe(true);
        });

        it('keeps sell2 >= sell1 >= 0 on every prefix', () => {
            const prices = [1, 2, 4, 2, 5, 7, 2, 4, 9, 0];
            for (let i = 0; i <= prices.length; i++) {
                const state = calculator.scan(prices.slice(0, i));
                expect(state.sell1).toBeGreaterThanOrEqual(0);
                expect(state.sell2).toBeGreaterThanOrEqual(state.sell1);
                expect(state.sell2).toBe(bestTwoTrades(prices.slice(0, i)));
            }
        });
    });
});
