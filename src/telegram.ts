import { createWriteStream } from 'node:fs';
import fs from 'node:fs/promises';
import { once } from 'node:events';
import type { Readable } from 'node:stream';
import axios, { type AxiosInstance } from 'axios';
import { Bot, InlineKeyboard, type Api } from 'grammy';
import type { Logger } from './logger';
import { errorMessage } from './errors';
import type { ChatNotifier, ChatTarget, Delivery, MediaSource } from './gifJob';
import type { GifSearch } from './gifSearch';
import type { GifJobQueue } from './queue';

const MB = 1024 * 1024;

export const BOT_MESSAGES = {
  start:
    "Hi! Send me a GIF and I'll optimize it and give you a download link!\n\n" +
    'Works on any device - no special setup needed.\n' +
    'You can also search for one with /gif <words>.',
  processing: 'Processing your GIF...',
  notMedia: 'Please send a GIF file!',
  gifUsage: 'Usage: /gif <search words>',
  noResults: 'No GIFs found for that search.',
  searchDisabled: 'GIF search is not enabled on this bot.',
  queueFailed: 'Could not start processing right now. Try again later.',
} as const;

export function tooLargeMessage(sizeBytes: number, maxBytes: number): string {
  return `That file is ${(sizeBytes / MB).toFixed(1)}MB; the limit is ${(maxBytes / MB).toFixed(0)}MB.`;
}

function formatLabel(delivery: Pick<Delivery, 'format' | 'withinBudget' | 'passthrough'>): string {
  if (delivery.format === 'gif') {
    return delivery.withinBudget ? 'Optimized GIF' : 'Optimized GIF (smallest we could make)';
  }
  // Sent as received: either no converter on this host, or every profile failed on this file
  return delivery.passthrough === 'conversion-failed'
    ? 'Original file (this file could not be converted)'
    : 'Original file (conversion unavailable)';
}

export function readyMessage(delivery: Pick<Delivery, 'sizeBytes' | 'format' | 'withinBudget' | 'passthrough'>): string {
  const format = formatLabel(delivery);
  return (
    'Your GIF is ready!\n\n' +
    `Size: ${(delivery.sizeBytes / MB).toFixed(1)}MB\n` +
    `Format: ${format}\n\n` +
    'Click the button below or copy this link:'
  );
}

// Inside a MarkdownV2 code span only ` and \ need escaping.
export function copyableLink(url: string): string {
  return '`' + url.replace(/[`\\]/g, (c) => `\\${c}`) + '`';
}

export class TelegramNotifier implements ChatNotifier {
  constructor(private readonly api: Pick<Api, 'editMessageText' | 'sendMessage'>) {}

  async status(target: ChatTarget, text: string): Promise<void> {
    await this.api.editMessageText(target.chatId, target.statusMessageId, text);
  }

  async delivered(target: ChatTarget, delivery: Delivery): Promise<void> {
    await this.api.editMessageText(target.chatId, target.statusMessageId, readyMessage(delivery), {
      reply_markup: new InlineKeyboard().url('Download GIF', delivery.url),
    });
    await this.api.sendMessage(target.chatId, copyableLink(delivery.url), {
      parse_mode: 'MarkdownV2',
      reply_parameters: { message_id: target.replyToMessageId, allow_sending_without_reply: true },
    });
  }

  async failed(target: ChatTarget, text: string): Promise<void> {
    await this.api.editMessageText(target.chatId, target.statusMessageId, text);
  }
}

export class TelegramFileSource implements MediaSource {
  private readonly http: AxiosInstance;

  constructor(
    private readonly api: Pick<Api, 'getFile'>,
    private readonly token: string,
    options: { http?: AxiosInstance; timeoutMs?: number } = {},
  ) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 60_000 });
  }

  fileUrl(filePath: string): string {
    return `https://api.telegram.org/file/bot${this.token}/${filePath}`;
  }

  async download(fileId: string, destination: string): Promise<void> {
    const file = await this.api.getFile(fileId);
    if (!file.file_path) {
      throw new Error('Telegram did not return a download path for this file');
    }
    const response = await this.http.get<Readable>(this.fileUrl(file.file_path), { responseType: 'stream' });
    const readStream = response.data;
    const write = createWriteStream(destination);
    try {
      await new Promise<void>((resolve, reject) => {
        readStream.pipe(write);
        readStream.on('error', reject);
        write.on('error', reject);
        write.on('finish', () => resolve());
      });
    } catch (err) {
      // the file may still be opening; remove it only once the stream has closed
      if (!write.closed) {
        write.destroy();
        await once(write, 'close');
      }
      await fs.rm(destination, { force: true });
      throw err;
    }
  }
}

export type BotDeps = {
  token: string;
  maxInputBytes: number;
  queue: GifJobQueue;
  logger: Logger;
  gifSearch?: GifSearch;
};

export function createBot({ token, maxInputBytes, queue, logger, gifSearch }: BotDeps): Bot {
  const bot = new Bot(token);

  bot.command('start', async (ctx) => {
    await ctx.reply(BOT_MESSAGES.start);
  });

  bot.command('gif', async (ctx) => {
    const query = ctx.match.trim();
    if (!gifSearch) {
      await ctx.reply(BOT_MESSAGES.searchDisabled);
      return;
    }
    if (!query) {
      await ctx.reply(BOT_MESSAGES.gifUsage);
      return;
    }
    const url = await gifSearch.search(query);
    if (!url) {
      await ctx.reply(BOT_MESSAGES.noResults);
      return;
    }
    await ctx.replyWithAnimation(url);
  });

  bot.on(['message:animation', 'message:document'], async (ctx) => {
    const media = ctx.message.animation ?? ctx.message.document;
    if (!media) {
      await ctx.reply(BOT_MESSAGES.notMedia);
      return;
    }
    if (media.file_size && media.file_size > maxInputBytes) {
      await ctx.reply(tooLargeMessage(media.file_size, maxInputBytes));
      return;
    }

    const status = await ctx.reply(BOT_MESSAGES.processing, {
      reply_parameters: { message_id: ctx.message.message_id },
    });
    const fileName = media.file_name ?? `gif_${media.file_unique_id}.mp4`;
    try {
      const jobId = await queue.enqueue({
        chatId: ctx.chat.id,
        replyToMessageId: ctx.message.message_id,
        statusMessageId: status.message_id,
        fileId: media.file_id,
        fileName,
      });
      logger.info({ jobId, chatId: ctx.chat.id, fileName, sizeBytes: media.file_size }, 'Queued GIF job');
    } catch (err) {
      logger.error({ err, chatId: ctx.chat.id }, 'Failed to queue GIF job');
      await ctx.api.editMessageText(ctx.chat.id, status.message_id, BOT_MESSAGES.queueFailed);
    }
  });

  bot.catch((err) => {
    logger.error({ err: err.error, updateId: err.ctx.update.update_id, message: errorMessage(err.error) }, 'Bot handler error');
  });

  return bot;
}
