// Amounts are kept in a single currency, rounded to cents
export const roundMoney = (amount: number): number => Math.round((amount + Number.EPSILON) * 100) / 100;
