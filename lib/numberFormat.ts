// 175 -> "175", 175.50 -> "175.5", 0.04 -> "0.04"
export function formatTrimmedDecimal(value: number, maxFractionDigits: number) {
  return String(Number(value.toFixed(maxFractionDigits)));
}
