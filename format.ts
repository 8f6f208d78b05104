// Template filters, exposed to every view through app.locals

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function toInteger(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : null;
    }
    if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
        return parseInt(value.trim(), 10);
    }
    return null;
}

// 1234567 -> "1,234,567"
export function formatNumber(value: unknown): string {
    if (value === null || value === undefined) {
        return '0';
    }
    const integer = toInteger(value);
    if (integer === null) {
        return String(value);
    }
    const sign = integer < 0 ? '-' : '';
    return sign + Math.abs(integer).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

// Seconds to M:SS
export function formatDuration(seconds: unknown): string {
    if (seconds === null || seconds === undefined) {
        return '0:00';
    }
    const total = toInteger(seconds);
    if (total === null) {
        return '0:00';
    }
    const minutes = Math.floor(total / 60);
    const rest = total - minutes * 60;
    return `${minutes}:${rest.toString().padStart(2, '0')}`;
}
