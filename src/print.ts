import { printExtendedReal, printFloat } from "./extended-real";
import type { Bracket, Interval } from "./interval";

const leftBrackets: Record<Bracket, string> = { inclusive: "[", exclusive: "(" };
const rightBrackets: Record<Bracket, string> = { inclusive: "]", exclusive: ")" };

export function print({ left, right, min, max, step }: Interval): string {
  const lo = printExtendedReal(min);
  const hi = printExtendedReal(max);
  const body = `${leftBrackets[left]}${lo},${hi}${rightBrackets[right]}`;
  return step === null ? body : `${body}//${printFloat(step)}`;
}
