// averages are reported with one decimal, halves rounded up
export function roundToTenth(value: number): number {
    return Math.round(value * 10) / 10;
}

// pg returns NUMERIC and BIGINT aggregates as strings
export function toNumberOrNull(value: string | number | null): number | null {
    if (value === null) return null;
    return Number(value);
}

// upper bound of a postgres SERIAL id
export const MAX_ID = 2147483647;

export function isIdString(value: string): boolean {
    return /^\d+$/.test(value) && Number(value) >= 1 && Number(value) <= MAX_ID;
}
