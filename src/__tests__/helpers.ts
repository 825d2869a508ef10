/**
 * Shared fakes for the test suites
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createLogger } from '../logger.js';
import type { ApiReply } from '../lookup/debtApiClient.js';
import type { LookupTransport, PermitSource, SleepFn } from '../lookup/lookupClient.js';
import type { Permit } from '../rateLimiter.js';
import type { Identifier } from '../types.js';

export const silentLogger = () => createLogger({ silent: true });

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers }
  });
}

/** Sleep that returns at once and records the requested delays */
export function instantSleep(delays: number[] = []): SleepFn {
  return async (ms, signal) => {
    delays.push(ms);
    return !signal?.aborted;
  };
}

/** Permit source without limits that counts requests in flight */
export class CountingPermits implements PermitSource {
  inFlight = 0;
  peak = 0;
  acquired = 0;
  private nextId = 1;

  async acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) throw new Error('aborted');
    this.inFlight += 1;
    this.acquired += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    return { id: this.nextId++ };
  }

  release(): void {
    this.inFlight -= 1;
  }
}

export type ReplyScript = ApiReply | ((signal?: AbortSignal) => Promise<ApiReply>);

/**
 * Transport that plays back a queue of replies per identifier. Once the
 * queue is down to one entry, that entry repeats.
 */
export class ScriptedTransport implements LookupTransport {
  readonly calls: Identifier[] = [];
  private readonly scripts: Map<Identifier, ReplyScript[]>;

  constructor(scripts: Record<Identifier, ReplyScript[]>) {
    this.scripts = new Map(Object.entries(scripts));
  }

  async query(identifier: Identifier, signal?: AbortSignal): Promise<ApiReply> {
    this.calls.push(identifier);
    const queue = this.scripts.get(identifier);
    const [next] = queue ?? [];
    if (!queue || next === undefined) {
      return { kind: 'not_found' };
    }
    if (queue.length > 1) queue.shift();
    return typeof next === 'function' ? next(signal) : next;
  }

  callsFor(identifier: Identifier): number {
    return this.calls.filter(id => id === identifier).length;
  }
}

/** Resolves after `ms`, or with `aborted` when the signal fires first */
export function delayedReply(reply: ApiReply, ms: number): (signal?: AbortSignal) => Promise<ApiReply> {
  return signal =>
    new Promise<ApiReply>(resolve => {
      if (signal?.aborted) {
        resolve({ kind: 'aborted' });
        return;
      }
      const timer = setTimeout(() => resolve(reply), ms);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          resolve({ kind: 'aborted' });
        },
        { once: true }
      );
    });
}
