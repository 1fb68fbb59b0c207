const stripZeros = (digits: string) =>
    digits.includes('.') ? digits.replace(/\.?0+$/, '') : digits;

/**
 * Formats like printf's `%g`: `significant` digits, trailing zeros dropped,
 * exponent notation when the exponent is below -4 or not below `significant`.
 */
export const formatNumber = (value: number, significant: number = 6): string => {
    if (Number.isNaN(value)) return 'nan';
    if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf';
    if (value === 0) return '0';

    const precision = Math.max(1, Math.round(significant));
    const [mantissa, exponentText] = value.toExponential(precision - 1).split('e');
    const exponent = Number(exponentText);

    if (exponent < -4 || exponent >= precision) {
        const sign = exponent < 0 ? '-' : '+';
        const magnitude = String(Math.abs(exponent)).padStart(2, '0');
        return `${stripZeros(mantissa)}e${sign}${magnitude}`;
    }

    return stripZeros(value.toFixed(precision - 1 - exponent));
};

export const formatPoint = (x: number, y: number, significant: number): string =>
    `(${formatNumber(x, significant)}, ${formatNumber(y, significant)})`;
