/**
 * Death detector orchestrator.
 *
 * Wires the session store, the sync client, the detection loop and the
 * global hotkeys around one command channel, then runs until SIGINT/SIGTERM.
 */

import { getSettings, resolveEngineConfig } from './config.js';
import { logger } from './logger.js';
import { SessionStore } from './state/session-store.js';
import { CommandChannel } from './state/command-channel.js';
import { WorkerMatcher } from './detection/worker-matcher.js';
import { EventGate } from './detection/event-gate.js';
import { loadTemplate } from './detection/template-loader.js';
import { ImageFileFrameSource } from './capture/image-file-source.js';
import { SyncClient } from './sync/client.js';
import { createWsTransportFactory } from './sync/ws-transport.js';
import { HotkeyRouter, type KeySource } from './hotkeys/router.js';
import { CommandDispatcher } from './engine/dispatcher.js';
import { EngineLoop } from './engine/loop.js';
import type { QueuedCommand, ReferenceTemplate } from './types/index.js';

const config = resolveEngineConfig(getSettings());

// ── Core components ────────────────────────────────────────────────────────

const store = new SessionStore();
const channel = new CommandChannel<QueuedCommand>();
const matcher = new WorkerMatcher({ threshold: config.threshold, scale: config.matchScale });
const gate = new EventGate(matcher, store, {
  cooldownSeconds: config.cooldownSeconds,
  requiredStreak: config.requiredStreak,
});
const frameSource = config.framePath ? new ImageFileFrameSource(config.framePath) : null;

const sync = new SyncClient({
  url: config.syncUrl,
  profile: config.profileName,
  password: config.profilePassword,
  store,
  transportFactory: createWsTransportFactory({ handshakeTimeoutMs: config.handshakeTimeoutMs }),
  reconnectDelayMs: config.reconnectDelayMs,
  reconnectMaxDelayMs: config.reconnectMaxDelayMs,
  sendTimeoutMs: config.sendTimeoutMs,
});

const dispatcher = new CommandDispatcher(store, sync);
const loop = new EngineLoop(frameSource, gate, store, channel, {
  fps: config.fps,
  region: config.region,
});

let hotkeys: HotkeyRouter | null = null;

// ── Observers ──────────────────────────────────────────────────────────────

store.subscribe((key, value) => {
  if (key === 'displayElapsedMs') return;
  logger.debug(`State: ${key} = ${JSON.stringify(value)}`);
});

sync.on('status', (status) => logger.info(`Sync status: ${status}`));
sync.on('authResult', (result) => {
  if (!result.success) logger.warn(`Edit rights refused${result.error ? `: ${result.error}` : ''}`);
});
dispatcher.on('displayModeToggled', () => logger.info('Display mode toggled'));

// ── Graceful shutdown ──────────────────────────────────────────────────────

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.info(`Received ${signal} — starting graceful shutdown...`);

  try {
    hotkeys?.stop();
    await loop.stop();
    await matcher.close();
    channel.close();
    await channel.whenIdle();
    sync.disconnect();
    logger.info('Shutdown complete. Goodbye.');
  } catch (err) {
    logger.error('Error during shutdown:', err);
  }

  process.exit(0);
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection:', reason);
});

process.on('uncaughtException', (err) => {
  logger.error('Uncaught exception:', err);
  void gracefulShutdown('uncaughtException');
});

// ── Startup ────────────────────────────────────────────────────────────────

async function loadReferenceTemplate(path: string): Promise<ReferenceTemplate | null> {
  try {
    return await loadTemplate(path);
  } catch (err) {
    logger.warn(`Could not load template "${path}" — automatic detection disabled:`, err);
    return null;
  }
}

async function createKeySource(): Promise<KeySource | null> {
  try {
    const { UiohookKeySource } = await import('./hotkeys/uiohook-source.js');
    return new UiohookKeySource();
  } catch (err) {
    logger.warn('Global keyboard hook unavailable — hotkeys disabled:', err);
    return null;
  }
}

async function main(): Promise<void> {
  logger.info('Death detector starting...');

  matcher.reload(await loadReferenceTemplate(config.templatePath), config.threshold);

  dispatcher.attach(channel);

  const keySource = await createKeySource();
  if (keySource) {
    hotkeys = new HotkeyRouter(channel, keySource);
    hotkeys.register(config.hotkeys.manualDeath, 'manual-death');
    hotkeys.register(config.hotkeys.toggleBoss, 'toggle-boss');
    hotkeys.register(config.hotkeys.toggleDetection, 'toggle-detection');
    hotkeys.register(config.hotkeys.toggleDisplay, 'toggle-display-mode');
    if (!hotkeys.start()) hotkeys = null;
  }

  if (config.autoConnect && config.profileName) {
    sync.connect();
  } else {
    logger.warn('No profile configured (PROFILE_NAME) — running offline');
  }

  loop.start();
  logger.info('Death detector running. Press Ctrl+C to stop.');
}

main().catch((err) => {
  logger.error('Fatal startup error:', err);
  process.exit(1);
});
