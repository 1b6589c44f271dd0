/**
 * Feed timestamp parsing and RFC-822 rendering. Output dates are rendered in
 * JST (+0900) regardless of the host timezone.
 */

export const JST_OFFSET_MINUTES = 9 * 60;

const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

// Zone names Date.parse does not know
const ZONE_ALIASES: Record<string, string> = {
    JST: '+0900',
    KST: '+0900',
    UT: '+0000',
    Z: '+0000'
};

// ISO-8601 date-time without an offset; read as UTC rather than host-local time
const ISO_WITHOUT_OFFSET = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

export function parseFeedDate(value: string | undefined | null): Date | null {
    if (!value) return null;
    let text = value.trim();
    if (!text) return null;

    if (ISO_WITHOUT_OFFSET.test(text)) {
        text = `${text.replace(' ', 'T')}Z`;
    } else {
        text = text.replace(/\s([A-Z]{1,3})$/, (whole, zone: string) =>
            ZONE_ALIASES[zone] ? ` ${ZONE_ALIASES[zone]}` : whole
        );
    }

    const parsed = new Date(text);
    return isNaN(parsed.getTime()) ? null : parsed;
}

function pad(n: number): string {
    return n.toString().padStart(2, '0');
}

export function formatRfc822(date: Date, offsetMinutes: number = JST_OFFSET_MINUTES): string {
    const shifted = new Date(date.getTime() + offsetMinutes * 60 * 1000);
    const sign = offsetMinutes < 0 ? '-' : '+';
    const abs = Math.abs(offsetMinutes);
    const zone = `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;

    return `${DAY_NAMES[shifted.getUTCDay()]}, ${pad(shifted.getUTCDate())} ${MONTH_NAMES[shifted.getUTCMonth()]} ` +
        `${shifted.getUTCFullYear()} ${pad(shifted.getUTCHours())}:${pad(shifted.getUTCMinutes())}:${pad(shifted.getUTCSeconds())} ${zone}`;
}
