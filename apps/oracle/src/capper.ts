export function capPrice(price: bigint, ceiling: bigint): bigint {
  return price > ceiling ? ceiling : price;
}
