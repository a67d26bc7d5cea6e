/**
 * Unit tests for the Discord notifier (axios mocked)
 */

import axios from 'axios';
import { createDiscordNotifier, sendDiscordEmbed } from '../notify/discord.js';

vi.mock('axios', () => ({
    default: { post: vi.fn() },
}));

const post = vi.mocked(axios.post);
const WEBHOOK = 'https://discord.example/api/webhooks/test';

describe('sendDiscordEmbed', () => {
    beforeEach(() => {
        post.mockReset();
    });

    it('posts one embed with title, description and colour', async () => {
        post.mockResolvedValue({ status: 204 });

        const outcome = await sendDiscordEmbed(WEBHOOK, { title: 'Run', description: '**Total Orders:** 3', color: 0xffa500 });

        expect(outcome).toBe('sent');
        expect(post).toHaveBeenCalledWith(
            WEBHOOK,
            { embeds: [{ title: 'Run', description: '**Total Orders:** 3', color: 0xffa500 }] },
            { timeout: 10_000 }
        );
    });

    it('defaults the colour to green', async () => {
        post.mockResolvedValue({ status: 204 });
        await sendDiscordEmbed(WEBHOOK, { title: 'Run', description: 'ok' });
        expect(post.mock.calls[0][1]).toEqual({ embeds: [{ title: 'Run', description: 'ok', color: 0x00ff00 }] });
    });

    it('reports a failed post instead of throwing', async () => {
        post.mockRejectedValue(new Error('Request failed with status code 404'));
        await expect(sendDiscordEmbed(WEBHOOK, { title: 'Run', description: 'ok' })).resolves.toBe('failed');
    });
});

describe('createDiscordNotifier', () => {
    beforeEach(() => {
        post.mockReset();
    });

    it('skips the post when no webhook is configured', async () => {
        const notify = createDiscordNotifier(null);
        await expect(notify({ title: 'Run', description: 'ok' })).resolves.toBe('skipped');
        expect(post).not.toHaveBeenCalled();
    });

    it('posts through the configured webhook', async () => {
        post.mockResolvedValue({ status: 204 });
        const notify = createDiscordNotifier(WEBHOOK);
        await expect(notify({ title: 'Run', description: 'ok' })).resolves.toBe('sent');
        expect(post.mock.calls[0][0]).toBe(WEBHOOK);
    });
});
