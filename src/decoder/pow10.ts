/** `POW10[n]` is the double nearest to 10^n, for n in 0..308. */
export const POW10: readonly number[] = Array.from({ length: 309 }, (_, exponent) =>
  Number(`1e${exponent}`)
);
