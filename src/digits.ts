/*
 String helpers shared by the encoders and the renderer.
*/

const DIGITS = /^[0-9]+$/;

export function isDigitString(value: string): boolean {
  return DIGITS.test(value);
}

/** Splits a string of digits into numbers, e.g. "107" => [1, 0, 7]. */
export function toDigits(value: string): number[] {
  const digits: number[] = [];
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i) - 48;
    if (code < 0 || code > 9) {
      throw new Error(`Character at index ${i} of "${value}" is not a digit`);
    }
    digits.push(code);
  }
  return digits;
}

/** True when `value` is non-empty and every character is in `allowed`. */
export function consistsOf(value: string, allowed: ReadonlySet<string>): boolean {
  if (value.length === 0) {
    return false;
  }
  for (const char of value) {
    if (!allowed.has(char)) {
      return false;
    }
  }
  return true;
}

/**
 * Run lengths of a bar pattern, alternating bar/space and starting with a bar.
 * A pattern that opens with a space gets a leading 0-width bar so the
 * alternation still holds.
 */
export function patternToModules(pattern: string): number[] {
  const modules: number[] = [];
  let current = 1;
  let run = 0;
  toDigits(pattern).forEach((bit, i) => {
    if (bit > 1) {
      throw new Error(`Bar pattern has "${bit}" at index ${i}; expected 0 or 1`);
    }
    if (bit === current) {
      run += 1;
    } else {
      modules.push(run);
      current = bit;
      run = 1;
    }
  });
  if (run > 0) {
    modules.push(run);
  }
  return modules;
}
