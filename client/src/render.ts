import type { Board } from '../../server/src/types/game';

const ROW_SEPARATOR = '---+---+---';

export function renderBoard(board: Board): string {
  return board.map((row) => ' ' + row.map((cell) => cell || ' ').join(' | ') + ' ').join(`\n${ROW_SEPARATOR}\n`);
}

export type Command =
  | { kind: 'move'; position: [number, number] }
  | { kind: 'chat'; text: string }
  | { kind: 'quit' }
  | { kind: 'again' }
  | { kind: 'help' }
  | { kind: 'invalid'; reason: string };

export const HELP_TEXT = [
  'Commands:',
  '  row,col       place your mark, e.g. 1,2 (rows and columns are 0-2)',
  '  chat <text>   send a chat message',
  '  again         ask for a rematch once the game is over',
  '  quit          leave the game',
].join('\n');

export function parseCommand(input: string): Command {
  const text = input.trim();
  const lower = text.toLowerCase();
  if (lower === 'quit' || lower === 'exit') return { kind: 'quit' };
  if (lower === 'again' || lower === 'rematch') return { kind: 'again' };
  if (lower === 'help' || lower === '?') return { kind: 'help' };
  if (lower === 'chat' || lower.startsWith('chat ')) {
    const message = text.slice(4).trim();
    if (!message) return { kind: 'invalid', reason: 'Chat message cannot be empty.' };
    return { kind: 'chat', text: message };
  }

  const parts = text.split(',').map((part) => part.trim());
  if (parts.length === 2 && parts.every((part) => /^[0-2]$/.test(part))) {
    return { kind: 'move', position: [Number(parts[0]), Number(parts[1])] };
  }
  return {
    kind: 'invalid',
    reason: 'Enter row and column as numbers between 0 and 2, separated by a comma.',
  };
}
