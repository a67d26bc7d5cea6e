/**
 * Discord webhook notification for the run summary.
 * Never throws: a failed post is logged and reported back as `'failed'`.
 */

import axios from 'axios';
import { errorMessage } from '@unshipped/shared';
import { notifyLogger } from '../../utils/logger.js';

export const SUMMARY_TITLE = 'Unshipped Orders Summary';
export const COLOR_SUCCESS = 0x00ff00;
export const COLOR_WARNING = 0xffa500;

const WEBHOOK_TIMEOUT_MS = 10_000;

export interface DiscordMessage {
    title: string;
    description: string;
    color?: number;
}

export type NotifyOutcome = 'sent' | 'failed' | 'skipped';

/** Post one embed */
export async function sendDiscordEmbed(webhookUrl: string, message: DiscordMessage): Promise<NotifyOutcome> {
    try {
        await axios.post(
            webhookUrl,
            {
                embeds: [{
                    title: message.title,
                    description: message.description,
                    color: message.color ?? COLOR_SUCCESS,
                }],
            },
            { timeout: WEBHOOK_TIMEOUT_MS }
        );
        notifyLogger.info({ title: message.title }, 'Discord notification sent');
        return 'sent';
    } catch (error: unknown) {
        notifyLogger.warn({ title: message.title, error: errorMessage(error) }, 'Discord notification failed');
        return 'failed';
    }
}

export type Notifier = (message: DiscordMessage) => Promise<NotifyOutcome>;

/** Notifier bound to a webhook; without a URL every call is a logged no-op */
export function createDiscordNotifier(webhookUrl: string | null): Notifier {
    return async (message) => {
        if (!webhookUrl) {
            notifyLogger.debug({ title: message.title }, 'No webhook configured - notification skipped');
            return 'skipped';
        }
        return sendDiscordEmbed(webhookUrl, message);
    };
}
