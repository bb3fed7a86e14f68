import { LMStudioClient } from '@lmstudio/sdk';
import { baseLogger } from '../logger.js';

const clients = new Map<string, LMStudioClient>();
const defaultFactory = (baseUrl: string) => new LMStudioClient({ baseUrl });
let createClient: (baseUrl: string) => LMStudioClient = defaultFactory;

/** LM Studio speaks websockets; accept the http form people paste in. */
export function toWebSocketUrl(value: string): string {
  if (/^http:\/\//i.test(value)) return value.replace(/^http:/i, 'ws:');
  if (/^https:\/\//i.test(value)) return value.replace(/^https:/i, 'wss:');
  return value;
}

async function disposeClient(client: LMStudioClient) {
  const asyncDispose = (
    client as { [Symbol.asyncDispose]?: () => Promise<void> }
  )[Symbol.asyncDispose];
  if (typeof asyncDispose === 'function') {
    await asyncDispose.call(client);
  }
}

export function getClient(baseUrl: string): LMStudioClient {
  const key = toWebSocketUrl(baseUrl);
  const existing = clients.get(key);
  if (existing) return existing;

  const client = createClient(key);
  clients.set(key, client);
  return client;
}

export async function closeAll(): Promise<void> {
  const entries = Array.from(clients.entries());
  clients.clear();

  await Promise.all(
    entries.map(async ([baseUrl, client]) => {
      try {
        await disposeClient(client);
      } catch (err) {
        baseLogger.warn({ err, baseUrl }, 'lmstudio client close failed');
      }
    }),
  );
}

export function setClientFactoryForTests(
  factory: (baseUrl: string) => LMStudioClient,
): void {
  clients.clear();
  createClient = factory;
}

export function restoreDefaultClientFactory(): void {
  clients.clear();
  createClient = defaultFactory;
}
