import net from 'net';
import { EventEmitter } from 'events';
import { LineSplitter } from '../../server/src/lib/protocol';
import type { Board, PlayerMark, Position } from '../../server/src/types/game';
import type { ServerMessage, ServerMessageType } from '../../server/src/types/protocol';

export interface GameClientOptions {
  host: string;
  port: number;
  username?: string;
  avatar?: string;
}

export type MessageOf<T extends ServerMessageType> = Extract<ServerMessage, { type: T }>;

const SERVER_MESSAGE_TYPES: readonly ServerMessageType[] = [
  'join_ack',
  'move_ack',
  'chat_broadcast',
  'quit_ack',
  'game_over',
  'new_game',
  'error',
];

const MAX_QUEUED_MESSAGES = 100;

export function isServerMessage(value: unknown): value is ServerMessage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('data' in value)) return false;
  const { type, data } = value;
  return (
    typeof type === 'string' &&
    SERVER_MESSAGE_TYPES.some((known) => known === type) &&
    typeof data === 'object' &&
    data !== null
  );
}

function emptyBoard(): Board {
  return [
    ['', '', ''],
    ['', '', ''],
    ['', '', ''],
  ];
}

/** X always opens, so equal counts mean X is to move. */
export function markToMove(board: Board): PlayerMark {
  let x = 0;
  let o = 0;
  for (const row of board) {
    for (const cell of row) {
      if (cell === 'X') x += 1;
      else if (cell === 'O') o += 1;
    }
  }
  return x > o ? 'O' : 'X';
}

interface Waiter {
  accepts(message: ServerMessage): boolean;
  resolve(message: ServerMessage): void;
}

/**
 * TCP client for the line protocol. Emits `message` for every server message,
 * `close` when the connection ends, and keeps the local view of the game.
 */
export class GameClient extends EventEmitter {
  gameId: string | null = null;
  symbol: PlayerMark | null = null;
  board: Board = emptyBoard();
  myTurn = false;
  gameOver = false;
  opponent: string | null = null;

  private playerName: string | null = null;
  private socket: net.Socket | null = null;
  private readonly splitter = new LineSplitter();
  private readonly queue: ServerMessage[] = [];
  private readonly waiters: Waiter[] = [];

  constructor(private readonly options: GameClientOptions) {
    super();
  }

  /** The name the server gave this player, once a game has started. */
  get username(): string | undefined {
    return this.playerName ?? this.options.username;
  }

  get connected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  /** Connects and sends the `join` request. */
  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.options.host, port: this.options.port });
      socket.once('error', reject);
      socket.once('connect', () => {
        socket.off('error', reject);
        this.socket = socket;
        socket.on('data', (chunk: Buffer) => this.onData(chunk));
        socket.on('error', (err) => this.emit('transport_error', err));
        socket.on('close', () => {
          this.socket = null;
          this.emit('close');
        });
        this.send('join', { username: this.options.username, avatar: this.options.avatar });
        resolve();
      });
    });
  }

  move(position: Position): void {
    this.myTurn = false;
    this.send('move', { game_id: this.gameId, position });
  }

  chat(message: string): void {
    this.send('chat', { game_id: this.gameId, message });
  }

  quit(): void {
    this.send('quit', { game_id: this.gameId });
  }

  requestRematch(response: 'start' | 'quit' = 'start'): void {
    this.send('new_game_response', { game_id: this.gameId, response });
  }

  close(): void {
    this.socket?.end();
  }

  /**
   * Resolves with the oldest unread message of `type`, waiting for one to
   * arrive if none has yet. Rejects after `timeoutMs`.
   */
  nextMessage<T extends ServerMessageType>(type: T, timeoutMs = 2000): Promise<MessageOf<T>> {
    const isWanted = (message: ServerMessage): message is MessageOf<T> => message.type === type;
    const index = this.queue.findIndex(isWanted);
    if (index !== -1) {
      const [message] = this.queue.splice(index, 1);
      if (isWanted(message)) return Promise.resolve(message);
    }
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        accepts: isWanted,
        resolve: (message) => {
          clearTimeout(timer);
          if (isWanted(message)) resolve(message);
        },
      };
      const timer = setTimeout(() => {
        const at = this.waiters.indexOf(waiter);
        if (at !== -1) this.waiters.splice(at, 1);
        reject(new Error(`Timed out waiting for ${type}`));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  private send(type: string, data: Record<string, unknown>): void {
    if (!this.socket || this.socket.destroyed) {
      this.emit('transport_error', new Error('Not connected'));
      return;
    }
    this.socket.write(JSON.stringify({ type, data }) + '\n');
  }

  private onData(chunk: Buffer): void {
    for (const frame of this.splitter.push(chunk)) {
      if (frame.kind === 'overflow') {
        this.emit('transport_error', new Error('Received an over-long line from server'));
        continue;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(frame.text);
      } catch {
        this.emit('transport_error', new Error('Received invalid JSON from server'));
        continue;
      }
      if (!isServerMessage(raw)) {
        this.emit('transport_error', new Error('Received an unrecognised message from server'));
        continue;
      }
      this.apply(raw);
      this.deliver(raw);
    }
  }

  private deliver(message: ServerMessage): void {
    const waiterIndex = this.waiters.findIndex((waiter) => waiter.accepts(message));
    if (waiterIndex !== -1) {
      const [waiter] = this.waiters.splice(waiterIndex, 1);
      waiter.resolve(message);
    } else {
      this.queue.push(message);
      if (this.queue.length > MAX_QUEUED_MESSAGES) this.queue.shift();
    }
    this.emit('message', message);
  }

  private apply(message: ServerMessage): void {
    switch (message.type) {
      case 'join_ack':
        if (message.data.status === 'success') {
          this.gameId = message.data.game_id;
          this.symbol = message.data.player_symbol;
          this.playerName = message.data.username;
          this.opponent = message.data.opponent.username;
          this.board = emptyBoard();
          this.myTurn = message.data.player_symbol === 'X';
          this.gameOver = false;
        }
        return;
      case 'move_ack':
        this.board = message.data.game_state;
        if (message.data.winner !== null) this.gameOver = true;
        // by symbol, not name: display names need not be unique
        this.myTurn = !this.gameOver && this.symbol !== null && markToMove(this.board) === this.symbol;
        return;
      case 'game_over':
      case 'quit_ack':
        this.gameOver = true;
        this.myTurn = false;
        return;
      case 'new_game':
        if (message.data.status === 'success') {
          this.gameId = message.data.game_id;
          this.symbol = message.data.player_symbol;
          this.playerName = message.data.username;
          this.board = message.data.game_state;
          this.myTurn = markToMove(this.board) === this.symbol;
          this.gameOver = false;
        }
        return;
      case 'chat_broadcast':
      case 'error':
        return;
    }
  }
}
