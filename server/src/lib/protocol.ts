import { StringDecoder } from 'string_decoder';
import { z } from 'zod';
import { ProtocolError } from './errors';
import type { ServerMessage } from '../types/protocol';

const GameIdSchema = z.string().trim().min(1, 'game_id is required');

const JoinDataSchema = z
  .object({
    username: z.string().trim().max(32).nullish(),
    avatar: z.string().trim().max(256).nullish(),
  })
  .default({});

const MoveDataSchema = z.object({
  game_id: GameIdSchema,
  // range is checked by the rules engine so out-of-bounds is a move failure, not a protocol error
  position: z.tuple([z.number(), z.number()]),
});

const ChatDataSchema = z.object({
  game_id: GameIdSchema,
  message: z.string().min(1, 'message is required').max(500),
});

const QuitDataSchema = z.object({
  game_id: GameIdSchema,
});

const NewGameResponseDataSchema = z.object({
  game_id: GameIdSchema,
  response: z.enum(['start', 'quit']),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('join'), data: JoinDataSchema }),
  z.object({ type: z.literal('move'), data: MoveDataSchema }),
  z.object({ type: z.literal('chat'), data: ChatDataSchema }),
  z.object({ type: z.literal('quit'), data: QuitDataSchema }),
  z.object({ type: z.literal('new_game_response'), data: NewGameResponseDataSchema }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type ClientMessageType = ClientMessage['type'];
export type JoinData = Extract<ClientMessage, { type: 'join' }>['data'];
export type MoveData = Extract<ClientMessage, { type: 'move' }>['data'];

export const CLIENT_MESSAGE_TYPES: readonly ClientMessageType[] = [
  'join',
  'move',
  'chat',
  'quit',
  'new_game_response',
];

const EnvelopeSchema = z.object({
  type: z.string(),
  data: z.unknown().optional(),
});

function isClientMessageType(type: string): type is ClientMessageType {
  return CLIENT_MESSAGE_TYPES.some((known) => known === type);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Decodes an already-parsed envelope into a typed client message.
 * Throws `ProtocolError` for anything that is not a known, well-formed message.
 */
export function decodeMessage(raw: unknown): ClientMessage {
  const envelope = EnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    throw new ProtocolError('missing_data', 'Message must be an object with a string "type".');
  }
  if (!isClientMessageType(envelope.data.type)) {
    throw new ProtocolError('unknown_type', 'Unknown message type.');
  }
  const parsed = ClientMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProtocolError('missing_data', describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseLine(line: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new ProtocolError('invalid_json', 'Invalid JSON format.');
  }
  return decodeMessage(raw);
}

export function encodeMessage(message: ServerMessage): string {
  return JSON.stringify(message) + '\n';
}

export type Frame = { kind: 'line'; text: string } | { kind: 'overflow' };

/**
 * Reassembles newline-delimited text from arbitrary byte chunks. Multi-byte
 * UTF-8 sequences split across chunks are held back until complete.
 *
 * A line longer than `maxLineLength` yields a single `overflow` frame in its
 * place; the rest of it, up to the next newline, is dropped.
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private buffer = '';
  private discarding = false;

  constructor(private readonly maxLineLength = 64 * 1024) {}

  push(chunk: Buffer | string): Frame[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);
    const frames: Frame[] = [];
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      if (this.discarding) {
        this.discarding = false;
      } else if (line.length > this.maxLineLength) {
        frames.push({ kind: 'overflow' });
      } else if (line.trim().length > 0) {
        frames.push({ kind: 'line', text: line });
      }
      newline = this.buffer.indexOf('\n');
    }
    if (this.buffer.length > this.maxLineLength) {
      this.buffer = '';
      if (!this.discarding) frames.push({ kind: 'overflow' });
      this.discarding = true;
    }
    return frames;
  }

  /** Text received after the last newline. */
  get pending(): string {
    return this.buffer;
  }
}
