/**
 * The single consumer of the command channel. Resolves local commands
 * against the session store and forwards everything else to the sync client.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import type { CommandChannel } from '../state/command-channel.js';
import type { SessionStore } from '../state/session-store.js';
import type { EngineCommand, ProtocolCommand, QueuedCommand } from '../types/index.js';

/** The part of SyncClient the dispatcher sends through. */
export interface CommandSink {
  send(command: ProtocolCommand): Promise<boolean>;
}

export interface DispatcherEvents {
  displayModeToggled: [];
  dispatched: [command: ProtocolCommand, sent: boolean];
}

export class CommandDispatcher extends EventEmitter<DispatcherEvents> {
  constructor(
    private readonly store: SessionStore,
    private readonly sink: CommandSink,
  ) {
    super();
  }

  /** Attach as the channel's consumer. */
  attach(channel: CommandChannel<QueuedCommand>): void {
    channel.consume((item) => this.handle(item));
  }

  async handle({ command, origin }: QueuedCommand): Promise<void> {
    const resolved = this.resolve(command);
    if (!resolved) return;

    const sent = await this.sink.send(resolved);
    logger.debug(`Dispatcher: ${resolved.type} from ${origin} ${sent ? 'sent' : 'dropped'}`);
    this.emit('dispatched', resolved, sent);
  }

  /** Map a command onto what goes over the wire, or apply it locally and return null. */
  resolve(command: EngineCommand): ProtocolCommand | null {
    switch (command.type) {
      case 'manual-death':
        return { type: this.store.get('bossMode') ? 'boss-death' : 'death' };
      case 'toggle-boss':
        return { type: this.store.get('bossMode') ? 'boss-cancel' : 'boss-start' };
      case 'toggle-detection': {
        const enabled = !this.store.get('detectionEnabled');
        this.store.set('detectionEnabled', enabled);
        logger.info(`Dispatcher: detection ${enabled ? 'enabled' : 'paused'}`);
        return null;
      }
      case 'toggle-display-mode':
        this.emit('displayModeToggled');
        return null;
      default:
        return command;
    }
  }
}
