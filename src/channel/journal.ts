/**
 * Message Journal
 *
 * Append-only JSONL record of published messages with file locking. Used for
 * audit and debugging replay only; nothing is redelivered from it.
 */

import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { lock } from 'proper-lockfile';
import { z } from 'zod';
import { ActorSchema } from '../domain/schemas';
import { ROLES } from '../domain/types';
import { createModuleLogger } from '../utils/logger';
import { TOPICS, type Message } from './types';

const log = createModuleLogger('message-journal');

export interface MessageJournalConfig {
  /** Path to the JSONL file */
  path: string;
  /** Enable file locking (default: true) */
  useLocking?: boolean;
}

const DEFAULT_CONFIG: Required<Omit<MessageJournalConfig, 'path'>> = {
  useLocking: true,
};

const JournalLineSchema = z.object({
  id: z.string(),
  topic: z.enum(TOPICS),
  sender: ActorSchema,
  targets: z.array(z.enum(ROLES)).optional(),
  payload: z.record(z.unknown()),
  timestamp: z.number(),
  causationId: z.string().optional(),
});

export class MessageJournal {
  private readonly config: Required<MessageJournalConfig>;
  private initialized = false;
  private chain: Promise<void> = Promise.resolve();

  constructor(config: MessageJournalConfig) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get path(): string {
    return this.config.path;
  }

  /**
   * Ensure the directory and file exist.
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    const dir = dirname(this.config.path);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    if (!existsSync(this.config.path)) {
      await writeFile(this.config.path, '', 'utf-8');
    }
    this.initialized = true;
  }

  /**
   * Appends are chained so lines land in publish order.
   */
  append(message: Message): Promise<void> {
    const next = this.chain.then(() => this.write(message));
    this.chain = next.catch((error: unknown) => {
      log.warn({ error: String(error), messageId: message.id }, 'Journal append failed');
    });
    return next;
  }

  async readAll(): Promise<Message[]> {
    await this.chain;
    if (!existsSync(this.config.path)) return [];
    const content = await readFile(this.config.path, 'utf-8');
    const messages: Message[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const parsed = JournalLineSchema.safeParse(parseLine(line));
      if (parsed.success) {
        messages.push(parsed.data);
      } else {
        log.warn({ issues: parsed.error.issues.length }, 'Skipping malformed journal line');
      }
    }
    return messages;
  }

  async flush(): Promise<void> {
    await this.chain;
  }

  private async write(message: Message): Promise<void> {
    await this.initialize();
    const line = JSON.stringify(message) + '\n';
    if (!this.config.useLocking) {
      await appendFile(this.config.path, line, 'utf-8');
      return;
    }
    const release = await lock(this.config.path, { retries: 5 });
    try {
      await appendFile(this.config.path, line, 'utf-8');
    } finally {
      await release();
    }
  }
}

/**
 * A torn final line from an interrupted append parses to null.
 */
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}
