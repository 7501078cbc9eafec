/**
 * Wire format of the session service. Every frame is a JSON object with a
 * `type` discriminator; inbound frames are validated before they touch state.
 */

import { z } from 'zod';
import type { ProtocolCommand, SessionState } from '../types/index.js';

// Inbound

const count = z.number().int().nonnegative();
const optionalText = z.string().nullable().optional();

export const StateMessageSchema = z.object({
  type: z.literal('bb-state'),
  deaths: count.optional(),
  elapsed: count.optional(),
  isRunning: z.boolean().optional(),
  bossFightMode: z.boolean().optional(),
  bossDeaths: count.optional(),
  bossPaused: z.boolean().optional(),
  canEdit: z.boolean().optional(),
  profileName: optionalText,
  displayName: optionalText,
});

export const AuthResultMessageSchema = z.object({
  type: z.literal('bb-auth-result'),
  success: z.boolean(),
  error: optionalText,
});

export const ErrorMessageSchema = z.object({
  type: z.literal('bb-error'),
  error: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
});

export const InboundMessageSchema = z.discriminatedUnion('type', [
  StateMessageSchema,
  AuthResultMessageSchema,
  ErrorMessageSchema,
]);

export type StateMessage = z.infer<typeof StateMessageSchema>;
export type AuthResultMessage = z.infer<typeof AuthResultMessageSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;

const KNOWN_INBOUND: ReadonlySet<string> = new Set(['bb-state', 'bb-auth-result', 'bb-error']);

const EnvelopeSchema = z.object({ type: z.string() });

export type DecodeResult =
  | { kind: 'message'; message: InboundMessage }
  | { kind: 'ignored'; type: string }
  | { kind: 'malformed'; reason: string };

export function decodeInbound(raw: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: 'malformed', reason: 'invalid JSON' };
  }

  const envelope = EnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { kind: 'malformed', reason: 'missing type' };
  }
  if (!KNOWN_INBOUND.has(envelope.data.type)) {
    return { kind: 'ignored', type: envelope.data.type };
  }

  const parsed = InboundMessageSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { kind: 'malformed', reason: `${envelope.data.type}: ${issue?.path.join('.') || '?'} ${issue?.message ?? ''}`.trim() };
  }
  return { kind: 'message', message: parsed.data };
}

/** Map a bb-state frame onto session keys. Absent fields stay untouched. */
export function snapshotToState(message: StateMessage): Partial<SessionState> {
  const next: Partial<SessionState> = {};
  if (message.deaths !== undefined) next.deathCount = message.deaths;
  if (message.elapsed !== undefined) next.elapsedMs = message.elapsed;
  if (message.isRunning !== undefined) next.running = message.isRunning;
  if (message.bossFightMode !== undefined) next.bossMode = message.bossFightMode;
  if (message.bossDeaths !== undefined) next.bossDeathCount = message.bossDeaths;
  if (message.bossPaused !== undefined) next.bossPaused = message.bossPaused;
  if (message.canEdit !== undefined) next.canEdit = message.canEdit;
  if (message.profileName !== undefined) next.profileId = message.profileName ?? '';
  if (message.displayName !== undefined) next.profileDisplayName = message.displayName ?? '';
  return next;
}

// Outbound

export type OutboundMessage = { type: string } & Record<string, string | number>;

export function encodeAuth(password: string): string {
  return JSON.stringify({ type: 'bb-auth', password });
}

export function commandToMessage(command: ProtocolCommand): OutboundMessage {
  switch (command.type) {
    case 'death':
      return { type: 'bb-death' };
    case 'boss-death':
      return { type: 'bb-boss-death' };
    case 'boss-start':
      return { type: 'bb-boss-start' };
    case 'boss-pause':
      return { type: 'bb-boss-pause' };
    case 'boss-resume':
      return { type: 'bb-boss-resume' };
    case 'boss-victory':
      return { type: 'bb-boss-victory', name: command.name };
    case 'boss-cancel':
      return { type: 'bb-boss-cancel' };
    case 'timer-start':
      return { type: 'bb-start' };
    case 'timer-stop':
      return { type: 'bb-stop' };
    case 'timer-reset':
      return { type: 'bb-reset' };
    case 'set-time':
      return { type: 'bb-set-time', elapsed: command.elapsedMs };
    case 'set-deaths':
      return { type: 'bb-set-deaths', deaths: command.deaths };
    case 'milestone-add':
      return { type: 'bb-milestone-add', name: command.name, icon: command.icon };
    case 'milestone-edit': {
      const message: OutboundMessage = { type: 'bb-milestone-edit', id: command.id, name: command.name, icon: command.icon };
      if (command.timestamp !== undefined) message.timestamp = command.timestamp;
      return message;
    }
    case 'milestone-delete':
      return { type: 'bb-milestone-delete', id: command.id };
  }
}

export function encodeCommand(command: ProtocolCommand): string {
  return JSON.stringify(commandToMessage(command));
}

/** Connection target for a profile; the same URL is reused on every reconnect. */
export function buildSessionUrl(baseUrl: string, profile: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set('profile', profile);
  return url.toString();
}
