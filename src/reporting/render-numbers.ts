/**
 * Number formatting for metric reports.
 */

const VALUE_SIG_FIGS = 3;

/**
 * Format a number for display in a metrics table.
 *
 * - Integers: formatted with commas
 * - Floats: at least 1 decimal place and at least 3 significant figures
 */
export function defaultRenderNumber(value: number): string {
  if (!Number.isFinite(value)) {
    return String(value);
  }
  if (Number.isInteger(value)) {
    return formatWithCommas(value, 0);
  }

  const absVal = Math.abs(value);
  let decimals: number;
  if (absVal >= 1) {
    const digits = Math.floor(Math.log10(absVal)) + 1;
    decimals = Math.max(1, VALUE_SIG_FIGS - digits);
  } else {
    const exponent = Math.floor(Math.log10(absVal));
    decimals = -exponent + VALUE_SIG_FIGS - 1;
  }

  return formatWithCommas(value, decimals);
}

function formatWithCommas(value: number, decimals: number): string {
  const [intDigits = '0', fraction] = Math.abs(value).toFixed(decimals).split('.');
  const intPart = intDigits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = value < 0 ? '-' : '';
  if (fraction) {
    return `${sign}${intPart}.${fraction}`;
  }
  return `${sign}${intPart}`;
}
