import { AppError, ErrorType } from './errors';

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

interface ScaledDecimal {
  units: bigint;
  scale: number;
}

export function isValidAmount(amount: string): boolean {
  return DECIMAL_PATTERN.test(amount);
}

function parseDecimal(amount: string): ScaledDecimal {
  const match = DECIMAL_PATTERN.exec(amount);
  if (!match) {
    throw new AppError({
      type: ErrorType.VALIDATION_ERROR,
      message: `Invalid amount: ${amount}`,
      context: { amount },
    });
  }
  const [, sign, whole, fraction = ''] = match;
  const units = BigInt(`${whole}${fraction}`);
  return { units: sign ? -units : units, scale: fraction.length };
}

function rescale(value: ScaledDecimal, scale: number): bigint {
  return value.units * 10n ** BigInt(scale - value.scale);
}

function render(units: bigint, scale: number): string {
  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(scale + 1, '0');
  const whole = digits.slice(0, digits.length - scale);
  const fraction = digits.slice(digits.length - scale);
  const body = scale > 0 ? `${whole}.${fraction}` : whole;
  return negative ? `-${body}` : body;
}

/**
 * Exact sum of decimal amount strings.
 * The result keeps the largest scale among the inputs, so "12.50" stays "12.50".
 */
export function sumAmounts(amounts: string[]): string {
  const values = amounts.map(parseDecimal);
  const scale = values.reduce((max, v) => Math.max(max, v.scale), 0);
  const total = values.reduce((sum, v) => sum + rescale(v, scale), 0n);
  return render(total, scale);
}

/**
 * Normalizes user input ("+5", " 3.10 ") into the stored decimal form
 */
export function normalizeAmount(input: string): string {
  const trimmed = input.trim().replace(/^\+/, '');
  const value = parseDecimal(trimmed);
  return render(value.units, value.scale);
}

export function isNegativeAmount(amount: string): boolean {
  return parseDecimal(amount).units < 0n;
}
