/**
 * Session sync client. Owns the one WebSocket connection to the session
 * service, keeps it authenticated, and reconnects with backoff when it drops.
 *
 * DISCONNECTED → CONNECTING → UNAUTHENTICATED → AUTHENTICATED → DISCONNECTED …
 *
 * Inbound bb-state frames are merged into the SessionStore in every state.
 * Outbound commands go out only while AUTHENTICATED and are otherwise
 * dropped; nothing is buffered across a disconnect.
 */

import { EventEmitter } from 'events';
import { logger, registerSecret } from '../logger.js';
import type { SessionStore } from '../state/session-store.js';
import { SyncStatus } from '../types/index.js';
import type { AuthResult, ProtocolCommand } from '../types/index.js';
import {
  buildSessionUrl,
  decodeInbound,
  encodeAuth,
  encodeCommand,
  snapshotToState,
  type InboundMessage,
  type StateMessage,
} from './protocol.js';
import { createWsTransportFactory, type SyncTransport, type TransportFactory } from './ws-transport.js';

export const DEFAULT_RECONNECT_DELAY_MS = 3000;
export const DEFAULT_RECONNECT_MAX_DELAY_MS = 30_000;
export const DEFAULT_SEND_TIMEOUT_MS = 2000;

export interface SyncClientEvents {
  status: [status: SyncStatus];
  connected: [];
  disconnected: [reason: string];
  authResult: [result: AuthResult];
  serverError: [message: string, code: string | number | undefined];
}

export interface SyncClientOptions {
  url: string;
  profile: string;
  password?: string;
  store: SessionStore;
  transportFactory?: TransportFactory;
  reconnectDelayMs?: number;
  reconnectMaxDelayMs?: number;
  sendTimeoutMs?: number;
}

export class SyncClient extends EventEmitter<SyncClientEvents> {
  private readonly baseUrl: string;
  private profile: string;
  private password: string;
  private readonly store: SessionStore;
  private readonly transportFactory: TransportFactory;
  private readonly reconnectDelayMs: number;
  private readonly reconnectMaxDelayMs: number;
  private readonly sendTimeoutMs: number;

  private transport: SyncTransport | null = null;
  /** Bumped whenever a connection is abandoned; stale transport callbacks compare against it. */
  private connectionId = 0;
  private _status = SyncStatus.DISCONNECTED;
  private opened = false;
  /** bb-auth goes out at most once per connection. */
  private authSent = false;
  private stopped = true;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private reconnectAttempt = 0;

  constructor(options: SyncClientOptions) {
    super();
    this.baseUrl = options.url;
    this.profile = options.profile;
    this.password = options.password ?? '';
    this.store = options.store;
    this.transportFactory = options.transportFactory ?? createWsTransportFactory();
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.reconnectMaxDelayMs = options.reconnectMaxDelayMs ?? DEFAULT_RECONNECT_MAX_DELAY_MS;
    this.sendTimeoutMs = options.sendTimeoutMs ?? DEFAULT_SEND_TIMEOUT_MS;
    if (this.password) registerSecret(this.password);
  }

  get status(): SyncStatus {
    return this._status;
  }

  get isAuthenticated(): boolean {
    return this._status === SyncStatus.AUTHENTICATED;
  }

  get hasPendingReconnect(): boolean {
    return this.reconnectTimer !== null;
  }

  get url(): string {
    return buildSessionUrl(this.baseUrl, this.profile);
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────

  /** Start the connection loop. Skips the backoff wait if a retry is pending. */
  connect(): void {
    this.stopped = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this._status !== SyncStatus.DISCONNECTED) return;
    this.open();
  }

  /** Close the connection for good. Cancels any pending reconnect. Idempotent. */
  disconnect(): void {
    this.stopped = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    const transport = this.transport;
    if (!transport) return;
    this.handleLoss('disconnect requested');
    try {
      transport.close();
    } catch (err) {
      logger.warn('SyncClient: error closing transport:', err);
      transport.terminate();
    }
  }

  /** Retarget to another profile and reconnect with its credentials. */
  switchProfile(profile: string, password: string): void {
    logger.info(`SyncClient: switching profile '${this.profile}' → '${profile}'`);
    this.disconnect();
    this.profile = profile;
    this.password = password;
    if (password) registerSecret(password);
    this.reconnectAttempt = 0;
    this.connect();
  }

  private open(): void {
    const id = ++this.connectionId;
    this.opened = false;
    this.authSent = false;
    this.setStatus(SyncStatus.CONNECTING);
    logger.info(`SyncClient: connecting to ${this.url}`);

    try {
      this.transport = this.transportFactory(this.url, {
        onOpen: () => this.handleOpen(id),
        onMessage: (data) => this.handleMessage(id, data),
        onClose: (code, reason) => this.handleClose(id, code, reason),
        onError: (err) => this.handleError(id, err),
      });
    } catch (err) {
      logger.warn('SyncClient: could not create transport:', err);
      this.transport = null;
      this.handleLoss('transport creation failed');
    }
  }

  private handleOpen(id: number): void {
    if (id !== this.connectionId) return;
    this.opened = true;
    this.reconnectAttempt = 0;
    this.setStatus(SyncStatus.UNAUTHENTICATED);
    this.store.set('connected', true);
    logger.info(`SyncClient: connected (profile '${this.profile}')`);
    this.emit('connected');
  }

  private handleClose(id: number, code: number, reason: string): void {
    if (id !== this.connectionId) return;
    this.handleLoss(`closed (${code}${reason ? `: ${reason}` : ''})`);
  }

  private handleError(id: number, err: Error): void {
    if (id !== this.connectionId) return;
    // ws always follows an error with a close; the close drives the transition
    logger.warn('SyncClient: transport error:', err.message);
  }

  /**
   * Single exit path from any connected or connecting state. Clears the
   * connection flags once, notifies, and schedules a retry unless stopped.
   */
  private handleLoss(reason: string): void {
    const wasOpen = this.opened;
    this.connectionId++;
    this.transport = null;
    this.opened = false;
    this.authSent = false;
    this.setStatus(SyncStatus.DISCONNECTED);
    this.store.merge({ connected: false, canEdit: false });

    if (this.stopped) {
      logger.info(`SyncClient: closed — ${reason}`);
    } else if (wasOpen) {
      logger.warn(`SyncClient: disconnected — ${reason}`);
    } else {
      logger.warn(`SyncClient: connection attempt failed — ${reason}`);
    }
    if (wasOpen) this.emit('disconnected', reason);

    if (!this.stopped) this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectTimer) return;

    this.reconnectAttempt++;
    const delay = Math.min(
      this.reconnectDelayMs * Math.pow(2, this.reconnectAttempt - 1),
      this.reconnectMaxDelayMs,
    );
    logger.info(`SyncClient: reconnecting in ${delay}ms (attempt ${this.reconnectAttempt})`);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.stopped) return;
      this.open();
    }, delay);
  }

  private setStatus(status: SyncStatus): void {
    if (status === this._status) return;
    this._status = status;
    this.emit('status', status);
  }

  // ── Inbound ────────────────────────────────────────────────────────────

  private handleMessage(id: number, raw: string): void {
    if (id !== this.connectionId) return;

    const decoded = decodeInbound(raw);
    switch (decoded.kind) {
      case 'malformed':
        logger.warn(`SyncClient: discarding malformed message (${decoded.reason})`);
        return;
      case 'ignored':
        logger.debug(`SyncClient: ignoring message type '${decoded.type}'`);
        return;
      case 'message':
        this.dispatchInbound(decoded.message);
        return;
    }
  }

  private dispatchInbound(message: InboundMessage): void {
    switch (message.type) {
      case 'bb-state':
        this.applyState(message);
        return;
      case 'bb-auth-result': {
        const error = message.error ?? null;
        this.store.set('canEdit', message.success);
        if (message.success) {
          this.setStatus(SyncStatus.AUTHENTICATED);
          logger.info('SyncClient: authenticated');
        } else {
          this.setStatus(SyncStatus.UNAUTHENTICATED);
          logger.warn(`SyncClient: authentication failed${error ? `: ${error}` : ''}`);
        }
        this.emit('authResult', { success: message.success, error });
        return;
      }
      case 'bb-error':
        logger.warn(`SyncClient: server error: ${message.error ?? 'unknown'}${message.code !== undefined ? ` (${message.code})` : ''}`);
        this.emit('serverError', message.error ?? 'unknown', message.code);
        return;
    }
  }

  private applyState(message: StateMessage): void {
    try {
      this.store.merge(snapshotToState(message));
    } catch (err) {
      logger.warn('SyncClient: state snapshot rejected:', err);
      return;
    }

    if (message.canEdit === true) {
      this.setStatus(SyncStatus.AUTHENTICATED);
      return;
    }
    if (message.canEdit === false && this._status === SyncStatus.AUTHENTICATED) {
      logger.warn('SyncClient: server revoked edit rights');
      this.setStatus(SyncStatus.UNAUTHENTICATED);
    }
    if (this._status === SyncStatus.UNAUTHENTICATED && this.password && !this.authSent) {
      this.authSent = true;
      logger.info('SyncClient: requesting edit rights');
      void this.write(encodeAuth(this.password));
    }
  }

  // ── Outbound ───────────────────────────────────────────────────────────

  /** Send a command if authenticated. Resolves false when dropped or failed. */
  async send(command: ProtocolCommand): Promise<boolean> {
    if (this._status !== SyncStatus.AUTHENTICATED) {
      logger.debug(`SyncClient: dropped '${command.type}' (${this._status})`);
      return false;
    }
    const sent = await this.write(encodeCommand(command));
    if (sent) logger.debug(`SyncClient: sent '${command.type}'`);
    return sent;
  }

  reportDeath(): Promise<boolean> {
    return this.send({ type: 'death' });
  }

  reportBossDeath(): Promise<boolean> {
    return this.send({ type: 'boss-death' });
  }

  bossStart(): Promise<boolean> {
    return this.send({ type: 'boss-start' });
  }

  bossPause(): Promise<boolean> {
    return this.send({ type: 'boss-pause' });
  }

  bossResume(): Promise<boolean> {
    return this.send({ type: 'boss-resume' });
  }

  bossVictory(name = ''): Promise<boolean> {
    return this.send({ type: 'boss-victory', name });
  }

  bossCancel(): Promise<boolean> {
    return this.send({ type: 'boss-cancel' });
  }

  startTimer(): Promise<boolean> {
    return this.send({ type: 'timer-start' });
  }

  stopTimer(): Promise<boolean> {
    return this.send({ type: 'timer-stop' });
  }

  resetTimer(): Promise<boolean> {
    return this.send({ type: 'timer-reset' });
  }

  setTime(elapsedMs: number): Promise<boolean> {
    return this.send({ type: 'set-time', elapsedMs });
  }

  setDeaths(deaths: number): Promise<boolean> {
    return this.send({ type: 'set-deaths', deaths });
  }

  addMilestone(name: string, icon = '★'): Promise<boolean> {
    return this.send({ type: 'milestone-add', name, icon });
  }

  editMilestone(id: string, name: string, icon: string, timestamp?: number): Promise<boolean> {
    return this.send({ type: 'milestone-edit', id, name, icon, timestamp });
  }

  deleteMilestone(id: string): Promise<boolean> {
    return this.send({ type: 'milestone-delete', id });
  }

  /**
   * Write one frame with a deadline. A transport error or a missed deadline
   * counts as a lost connection.
   */
  private write(data: string): Promise<boolean> {
    const transport = this.transport;
    const id = this.connectionId;
    if (!transport) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      let settled = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          this.handleSendFailure(id, transport, err);
          resolve(false);
        } else {
          resolve(true);
        }
      };
      const timer = setTimeout(() => {
        finish(new Error(`send timed out after ${this.sendTimeoutMs}ms`));
      }, this.sendTimeoutMs);

      try {
        transport.send(data, (err) => finish(err ?? undefined));
      } catch (err) {
        finish(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  private handleSendFailure(id: number, transport: SyncTransport, err: Error): void {
    if (id !== this.connectionId) return;
    logger.warn('SyncClient: send failed:', err.message);
    this.handleLoss(`send failed: ${err.message}`);
    transport.terminate();
  }
}
