/** Orders snowflakes by creation time, then by worker/sequence bits. */
export const compareSnowflakes = (a: string, b: string): number => {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left < right ? -1 : 1;
};
