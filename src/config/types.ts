// src/config/types.ts
export const TYPES = {
    IProfitCalculator: Symbol.for('IProfitCalculator')
};
