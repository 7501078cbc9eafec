import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SyncClient } from '../src/sync/client.js';
import { logger } from '../src/logger.js';
import { SessionStore } from '../src/state/session-store.js';
import { SyncStatus } from '../src/types/index.js';
import type { StateChangeArgs } from '../src/types/index.js';
import type { SyncTransport, TransportFactory, TransportHandlers } from '../src/sync/ws-transport.js';

// ── In-process transport ───────────────────────────────────────────────────

class FakeTransport implements SyncTransport {
  sent: unknown[] = [];
  closed = false;
  terminated = false;
  /** When false, send callbacks are held until flushSends(). */
  autoAck = true;
  private heldCallbacks: Array<(err?: Error) => void> = [];

  constructor(readonly url: string, readonly handlers: TransportHandlers) {}

  send(data: string, callback: (err?: Error) => void): void {
    this.sent.push(JSON.parse(data));
    if (this.autoAck) callback();
    else this.heldCallbacks.push(callback);
  }

  close(): void {
    this.closed = true;
  }

  terminate(): void {
    this.terminated = true;
  }

  flushSends(err?: Error): void {
    const callbacks = this.heldCallbacks;
    this.heldCallbacks = [];
    for (const cb of callbacks) cb(err);
  }

  // server side
  open(): void {
    this.handlers.onOpen();
  }

  receive(message: unknown): void {
    this.handlers.onMessage(typeof message === 'string' ? message : JSON.stringify(message));
  }

  drop(code = 1006, reason = ''): void {
    this.handlers.onClose(code, reason);
  }
}

function setup(password = 'test-secret') {
  const store = new SessionStore();
  const transports: FakeTransport[] = [];
  const factory: TransportFactory = (url, handlers) => {
    const transport = new FakeTransport(url, handlers);
    transports.push(transport);
    return transport;
  };
  const client = new SyncClient({
    url: 'ws://127.0.0.1:3000/ws',
    profile: 'run-one',
    password,
    store,
    transportFactory: factory,
    reconnectDelayMs: 3000,
    reconnectMaxDelayMs: 30_000,
    sendTimeoutMs: 2000,
  });
  const current = (): FakeTransport => {
    const transport = transports.at(-1);
    if (!transport) throw new Error('no transport created');
    return transport;
  };
  return { store, client, transports, current };
}

async function authenticate(transport: FakeTransport): Promise<void> {
  transport.open();
  transport.receive({ type: 'bb-state', deaths: 0, canEdit: false });
  transport.receive({ type: 'bb-auth-result', success: true });
  await Promise.resolve();
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

// ── Connection and auth ────────────────────────────────────────────────────

describe('SyncClient connection', () => {
  it('connects to the profile URL and marks the store connected on open', () => {
    const { client, store, current } = setup();
    client.connect();
    expect(client.status).toBe(SyncStatus.CONNECTING);
    expect(current().url).toBe('ws://127.0.0.1:3000/ws?profile=run-one');

    current().open();

    expect(client.status).toBe(SyncStatus.UNAUTHENTICATED);
    expect(store.get('connected')).toBe(true);
    expect(store.get('canEdit')).toBe(false);
  });

  it('sends exactly one auth request after a snapshot without edit rights', () => {
    const { client, store, current } = setup();
    client.connect();
    const transport = current();
    transport.open();

    transport.receive({ type: 'bb-state', deaths: 5, canEdit: false });
    transport.receive({ type: 'bb-state', deaths: 6, canEdit: false });

    expect(store.get('deathCount')).toBe(6);
    expect(transport.sent).toEqual([{ type: 'bb-auth', password: 'test-secret' }]);
  });

  it('becomes authenticated on a successful auth result', async () => {
    const { client, store, current } = setup();
    const results = vi.fn();
    client.on('authResult', results);
    client.connect();

    await authenticate(current());

    expect(client.status).toBe(SyncStatus.AUTHENTICATED);
    expect(store.get('canEdit')).toBe(true);
    expect(results).toHaveBeenCalledWith({ success: true, error: null });
  });

  it('stays unauthenticated on a failed auth result and keeps receiving state', () => {
    const { client, store, current } = setup();
    const results = vi.fn();
    client.on('authResult', results);
    client.connect();
    const transport = current();
    transport.open();
    transport.receive({ type: 'bb-state', canEdit: false });

    transport.receive({ type: 'bb-auth-result', success: false, error: 'wrong password' });
    transport.receive({ type: 'bb-state', deaths: 9, canEdit: false });

    expect(client.status).toBe(SyncStatus.UNAUTHENTICATED);
    expect(store.get('canEdit')).toBe(false);
    expect(store.get('deathCount')).toBe(9);
    expect(results).toHaveBeenCalledWith({ success: false, error: 'wrong password' });
    expect(transport.sent).toHaveLength(1);
  });

  it('does not request edit rights without a password', () => {
    const { client, current } = setup('');
    client.connect();
    const transport = current();
    transport.open();
    transport.receive({ type: 'bb-state', canEdit: false });
    expect(transport.sent).toEqual([]);
  });

  it('treats a snapshot granting edit rights as authenticated', () => {
    const { client, store, current } = setup();
    client.connect();
    const transport = current();
    transport.open();

    transport.receive({ type: 'bb-state', canEdit: true, profileName: 'run-one', displayName: 'Run One' });

    expect(client.status).toBe(SyncStatus.AUTHENTICATED);
    expect(store.get('profileDisplayName')).toBe('Run One');
    expect(transport.sent).toEqual([]);
  });

  it('discards malformed frames and stays connected', () => {
    const { client, store, current } = setup();
    client.connect();
    const transport = current();
    transport.open();

    transport.receive('{"type":"bb-state","deaths":"lots"');
    transport.receive({ type: 'bb-state', deaths: 'lots' });
    transport.receive({ type: 'bb-state', deaths: 2 });

    expect(client.status).toBe(SyncStatus.UNAUTHENTICATED);
    expect(store.get('connected')).toBe(true);
    expect(store.get('deathCount')).toBe(2);
  });

  it('emits server errors', () => {
    const { client, current } = setup();
    const errors = vi.fn();
    client.on('serverError', errors);
    client.connect();
    current().open();

    current().receive({ type: 'bb-error', error: 'not allowed', code: 'E_PERM' });

    expect(errors).toHaveBeenCalledWith('not allowed', 'E_PERM');
  });
});

// ── Loss and reconnect ─────────────────────────────────────────────────────

describe('SyncClient reconnect', () => {
  it('clears both flags once and schedules one reconnect when the transport closes', async () => {
    const { client, store, transports, current } = setup();
    client.connect();
    await authenticate(current());

    const changes: StateChangeArgs[] = [];
    store.subscribe((...change) => changes.push(change));
    const disconnected = vi.fn();
    client.on('disconnected', disconnected);

    current().drop(1006);

    expect(changes).toEqual([
      ['connected', false],
      ['canEdit', false],
    ]);
    expect(disconnected).toHaveBeenCalledTimes(1);
    expect(client.status).toBe(SyncStatus.DISCONNECTED);
    expect(client.hasPendingReconnect).toBe(true);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(2999);
    expect(transports).toHaveLength(1);
    vi.advanceTimersByTime(1);
    expect(transports).toHaveLength(2);
    expect(transports[1].url).toBe('ws://127.0.0.1:3000/ws?profile=run-one');
  });

  it('backs off exponentially while attempts fail and resets after a successful open', () => {
    const { client, transports, current } = setup();
    client.connect();

    current().drop();
    vi.advanceTimersByTime(3000);
    expect(transports).toHaveLength(2);

    current().drop();
    vi.advanceTimersByTime(5999);
    expect(transports).toHaveLength(2);
    vi.advanceTimersByTime(1);
    expect(transports).toHaveLength(3);

    current().open();
    current().drop();
    vi.advanceTimersByTime(3000);
    expect(transports).toHaveLength(4);
  });

  it('caps the backoff delay', () => {
    const { client, transports, current } = setup();
    client.connect();
    for (let i = 0; i < 6; i++) {
      current().drop();
      vi.advanceTimersByTime(30_000);
    }
    expect(transports).toHaveLength(7);

    current().drop();
    vi.advanceTimersByTime(29_999);
    expect(transports).toHaveLength(7);
    vi.advanceTimersByTime(1);
    expect(transports).toHaveLength(8);
  });

  it('ignores callbacks from a transport it has abandoned', () => {
    const { client, store, transports, current } = setup();
    client.connect();
    const first = current();
    first.open();
    first.drop();
    vi.advanceTimersByTime(3000);

    first.receive({ type: 'bb-state', deaths: 99 });
    first.drop();

    expect(store.get('deathCount')).toBe(0);
    expect(transports).toHaveLength(2);
    expect(client.hasPendingReconnect).toBe(false);
  });

  it('re-authenticates on the new connection', async () => {
    const { client, transports, current } = setup();
    client.connect();
    await authenticate(current());
    current().drop();
    vi.advanceTimersByTime(3000);

    const second = current();
    second.open();
    second.receive({ type: 'bb-state', canEdit: false });

    expect(transports).toHaveLength(2);
    expect(second.sent).toEqual([{ type: 'bb-auth', password: 'test-secret' }]);
  });

  it('stops reconnecting after disconnect', () => {
    const { client, store, transports, current } = setup();
    client.connect();
    current().open();

    client.disconnect();
    client.disconnect();

    expect(current().closed).toBe(true);
    expect(store.get('connected')).toBe(false);
    expect(client.hasPendingReconnect).toBe(false);
    vi.advanceTimersByTime(60_000);
    expect(transports).toHaveLength(1);
  });

  it('logs a requested close at info level, not as a failure', () => {
    const { client, current } = setup();
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const info = vi.spyOn(logger, 'info').mockImplementation(() => {});
    client.connect();
    expect(client.status).toBe(SyncStatus.CONNECTING);

    client.disconnect();

    expect(current().closed).toBe(true);
    expect(info).toHaveBeenCalledWith('SyncClient: closed — disconnect requested');
    expect(warn).not.toHaveBeenCalled();
    warn.mockRestore();
    info.mockRestore();
  });

  it('reconnects to the new profile on switch', () => {
    const { client, transports, current } = setup();
    client.connect();
    current().open();

    client.switchProfile('run-two', 'test-secret-2');

    expect(transports[0].closed).toBe(true);
    expect(transports).toHaveLength(2);
    expect(current().url).toBe('ws://127.0.0.1:3000/ws?profile=run-two');
    current().open();
    current().receive({ type: 'bb-state', canEdit: false });
    expect(current().sent).toEqual([{ type: 'bb-auth', password: 'test-secret-2' }]);
  });
});

// ── Outbound commands ──────────────────────────────────────────────────────

describe('SyncClient commands', () => {
  it('drops commands unless authenticated', async () => {
    const { client, current } = setup();
    expect(await client.reportDeath()).toBe(false);

    client.connect();
    current().open();
    expect(await client.reportDeath()).toBe(false);
    expect(current().sent).toEqual([]);
  });

  it('sends concurrent commands without losing either', async () => {
    const { client, current } = setup();
    client.connect();
    await authenticate(current());
    const transport = current();
    transport.sent = [];

    const results = await Promise.all([client.reportDeath(), client.bossStart()]);

    expect(results).toEqual([true, true]);
    expect(transport.sent).toEqual([{ type: 'bb-death' }, { type: 'bb-boss-start' }]);
  });

  it('maps convenience methods onto wire messages', async () => {
    const { client, current } = setup();
    client.connect();
    await authenticate(current());
    const transport = current();
    transport.sent = [];

    await client.bossVictory('Gate Warden');
    await client.setDeaths(4);
    await client.addMilestone('Bridge');

    expect(transport.sent).toEqual([
      { type: 'bb-boss-victory', name: 'Gate Warden' },
      { type: 'bb-set-deaths', deaths: 4 },
      { type: 'bb-milestone-add', name: 'Bridge', icon: '★' },
    ]);
  });

  it('treats a send that never completes as a lost connection', async () => {
    const { client, store, current } = setup();
    client.connect();
    await authenticate(current());
    const transport = current();
    transport.autoAck = false;

    const pending = client.reportDeath();
    vi.advanceTimersByTime(2000);

    expect(await pending).toBe(false);
    expect(transport.terminated).toBe(true);
    expect(store.get('connected')).toBe(false);
    expect(client.status).toBe(SyncStatus.DISCONNECTED);
    expect(client.hasPendingReconnect).toBe(true);
  });

  it('treats a send error as a lost connection', async () => {
    const { client, store, current } = setup();
    client.connect();
    await authenticate(current());
    const transport = current();
    transport.autoAck = false;

    const pending = client.reportDeath();
    transport.flushSends(new Error('socket hang up'));

    expect(await pending).toBe(false);
    expect(store.get('canEdit')).toBe(false);
    expect(client.hasPendingReconnect).toBe(true);
  });
});
