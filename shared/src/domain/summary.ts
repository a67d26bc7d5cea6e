/**
 * Run summary text for the operator notification.
 */

export interface RunSummaryCounts {
    labelVendorOrders: number;
    nonLabelVendorOrders: number;
    totalOrders: number;
    newSkuOrders: number;
    removedRows: number;
    /** Present only when the bulk-buy check ran */
    bulkBuyOrders?: number;
    warnings: number;
}

export interface TimestampFormatOptions {
    timeZone?: string;
    /** Append the zone's short name, e.g. "2026-10-18 09:30:00 EDT" */
    annotateTimeZone?: boolean;
}

/** `YYYY-MM-DD HH:mm:ss` in the given zone (UTC by default) */
export function formatRunTimestamp(date: Date, options: TimestampFormatOptions = {}): string {
    const timeZone = options.timeZone ?? 'UTC';
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
        timeZoneName: 'short',
    }).formatToParts(date);

    const part = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find((p) => p.type === type)?.value ?? '';

    const stamp = `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
    return options.annotateTimeZone ? `${stamp} ${part('timeZoneName')}` : stamp;
}

export function buildRunSummary(counts: RunSummaryCounts, timestamp: string): string {
    const lines = [
        `**Timestamp:** ${timestamp}`,
        `**Total Label Vendors Orders:** ${counts.labelVendorOrders}`,
        `**Total Non-Label Vendors Orders:** ${counts.nonLabelVendorOrders}`,
        `**Total Orders:** ${counts.totalOrders}`,
        `**New SKUs Found:** ${counts.newSkuOrders}`,
        `**Removed Orders (RET/INV):** ${counts.removedRows}`,
    ];
    if (counts.bulkBuyOrders !== undefined) {
        lines.push(`**Bulk Buy Orders:** ${counts.bulkBuyOrders}`);
    }
    if (counts.warnings > 0) {
        lines.push(`**Warnings:** ${counts.warnings}`);
    }
    return lines.join('\n');
}
