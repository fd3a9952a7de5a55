#!/usr/bin/env node
import readline from 'readline';
import { parseArgs } from 'util';
import type { ServerMessage } from '../../server/src/types/protocol';
import { GameClient, markToMove } from './gameClient';
import { HELP_TEXT, parseCommand, renderBoard } from './render';

function describe(client: GameClient, message: ServerMessage): string {
  switch (message.type) {
    case 'join_ack':
      if (message.data.status === 'waiting') return message.data.message;
      return `Game started against ${message.data.opponent.username}! You are '${message.data.player_symbol}' as ${message.data.username}.`;
    case 'move_ack': {
      const { data } = message;
      if (data.status === 'failure') return `Move failed: ${data.message}`;
      const board = renderBoard(data.game_state);
      if (data.winner === 'draw') return `${board}\n\nThe game ended in a draw.`;
      if (data.winner) {
        // the winner made the last move, so the other mark is "to move"
        const won = client.symbol !== null && markToMove(data.game_state) !== client.symbol;
        return won ? `${board}\n\nCongratulations, you won!` : `${board}\n\n${data.winner} has won the game.`;
      }
      return `${board}\n\nIt's ${data.next_player ?? 'nobody'}'s turn.`;
    }
    case 'chat_broadcast':
      return `${message.data.username}: ${message.data.message}`;
    case 'quit_ack':
      return message.data.message;
    case 'game_over':
      return "Type 'again' for a rematch or 'quit' to leave.";
    case 'new_game':
      if (message.data.status === 'waiting') return "Waiting for your opponent's answer...";
      return `New game! You are '${message.data.player_symbol}'. ${message.data.next_player} moves first.\n\n${renderBoard(message.data.game_state)}`;
    case 'error':
      return `Error from server [${message.data.code}]: ${message.data.message}`;
  }
}

async function main() {
  const { values } = parseArgs({
    options: {
      host: { type: 'string', default: '127.0.0.1' },
      port: { type: 'string', default: '65432' },
      username: { type: 'string', default: '' },
      avatar: { type: 'string' },
    },
  });
  const port = Number(values.port);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    console.error(`Invalid port: ${values.port}`);
    process.exit(2);
  }

  const client = new GameClient({
    host: values.host ?? '127.0.0.1',
    port,
    username: values.username || undefined,
    avatar: values.avatar,
  });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const prompt = () => {
    rl.setPrompt(client.myTurn ? "Your move (row,col), 'chat <text>' or 'quit': " : '> ');
    rl.prompt();
  };

  client.on('message', (message: ServerMessage) => {
    console.log(`\n${describe(client, message)}`);
    prompt();
  });
  client.on('transport_error', (err: Error) => {
    console.error(`Connection problem: ${err.message}`);
  });
  client.on('close', () => {
    console.log('Disconnected from server.');
    rl.close();
  });

  rl.on('line', (input) => {
    const command = parseCommand(input);
    switch (command.kind) {
      case 'move':
        if (!client.gameId || client.gameOver) console.log('There is no game to move in.');
        else if (!client.myTurn) console.log('Wait for your turn.');
        else client.move(command.position);
        break;
      case 'chat':
        if (client.gameId) client.chat(command.text);
        else console.log('You can chat once the game starts.');
        break;
      case 'again':
        client.requestRematch('start');
        break;
      case 'quit':
        if (client.gameId && !client.gameOver) client.quit();
        client.close();
        return;
      case 'help':
        console.log(HELP_TEXT);
        break;
      case 'invalid':
        console.log(command.reason);
        break;
    }
    prompt();
  });
  rl.on('SIGINT', () => {
    if (client.gameId && !client.gameOver) client.quit();
    client.close();
  });

  try {
    await client.connect();
  } catch (err) {
    console.error(`Failed to connect to the server: ${err instanceof Error ? err.message : String(err)}`);
    rl.close();
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
