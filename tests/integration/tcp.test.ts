import net from 'net';
import { GameClient } from '../../client/src/gameClient';
import { createGameContext, type GameContext } from '../../server/src/context';
import { LineSplitter } from '../../server/src/lib/protocol';
import { TcpGateway } from '../../server/src/socket/tcp';

const HOST = '127.0.0.1';

describe('TcpGateway', () => {
  let ctx: GameContext;
  let gateway: TcpGateway;
  let port: number;
  const clients: GameClient[] = [];

  async function startGateway(maxWorkers: number): Promise<void> {
    ctx = createGameContext(maxWorkers);
    gateway = new TcpGateway(ctx, { host: HOST, port: 0, idleTimeoutMs: 0 });
    port = (await gateway.start()).port;
  }

  async function join(username?: string): Promise<GameClient> {
    const client = new GameClient({ host: HOST, port, username });
    clients.push(client);
    await client.connect();
    return client;
  }

  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) client.close();
    await gateway.stop();
  });

  it('plays a game over newline-delimited JSON and reports the disconnect', async () => {
    await startGateway(10);
    const alice = await join('Alice');
    expect((await alice.nextMessage('join_ack')).data).toEqual({
      status: 'waiting',
      message: 'Waiting for an opponent...',
    });

    const bob = await join('Bob');
    const bobAck = await bob.nextMessage('join_ack');
    const aliceAck = await alice.nextMessage('join_ack');
    expect(bobAck.data).toMatchObject({ status: 'success', player_symbol: 'O', opponent: { username: 'Alice' } });
    expect(aliceAck.data).toMatchObject({ status: 'success', player_symbol: 'X', opponent: { username: 'Bob' } });
    expect(alice.gameId).not.toBeNull();
    expect(bob.gameId).toBe(alice.gameId);
    expect(alice.myTurn).toBe(true);

    alice.move([0, 0]);
    const [seenByAlice, seenByBob] = await Promise.all([alice.nextMessage('move_ack'), bob.nextMessage('move_ack')]);
    expect(seenByAlice.data).toEqual(seenByBob.data);
    expect(seenByBob.data).toMatchObject({ status: 'success', next_player: 'Bob', winner: null });
    expect(bob.myTurn).toBe(true);
    expect(bob.board[0][0]).toBe('X');

    bob.move([0, 0]);
    expect((await bob.nextMessage('move_ack')).data).toMatchObject({
      status: 'failure',
      code: 'invalid_move',
      message: 'Position already occupied.',
    });

    alice.close();
    expect((await bob.nextMessage('quit_ack')).data).toEqual({
      status: 'success',
      message: 'Alice has left the game.',
    });
    expect(bob.gameOver).toBe(true);
  });

  it('learns the server-assigned name and follows the turn without a username', async () => {
    await startGateway(10);
    const x = await join('Alice');
    await x.nextMessage('join_ack');
    const o = await join();
    const ack = await o.nextMessage('join_ack');
    expect(ack.data.status === 'success' && ack.data.username).toMatch(/^Player_[0-9a-f]{6}$/);
    expect(o.username).toMatch(/^Player_[0-9a-f]{6}$/);
    expect(o.myTurn).toBe(false);
    await x.nextMessage('join_ack');

    x.move([0, 0]);
    const moved = await o.nextMessage('move_ack');
    expect(moved.data.next_player).toBe(o.username);
    expect(o.myTurn).toBe(true);

    o.move([1, 1]);
    await o.nextMessage('move_ack');
    await x.nextMessage('move_ack');
    expect((await x.nextMessage('move_ack')).data.next_player).toBe('Alice');
    expect(x.myTurn).toBe(true);
    expect(o.myTurn).toBe(false);
  });

  it('keeps two players with the same name on separate turns', async () => {
    await startGateway(10);
    const first = await join('Sam');
    await first.nextMessage('join_ack');
    const second = await join('Sam');
    await second.nextMessage('join_ack');
    await first.nextMessage('join_ack');
    expect([first.myTurn, second.myTurn]).toEqual([true, false]);

    first.move([2, 2]);
    await Promise.all([first.nextMessage('move_ack'), second.nextMessage('move_ack')]);
    expect([first.myTurn, second.myTurn]).toEqual([false, true]);
  });

  it('frames lines split and joined across TCP writes', async () => {
    await startGateway(10);
    const socket = net.createConnection({ host: HOST, port });
    const splitter = new LineSplitter();
    const lines: string[] = [];
    const received = new Promise<void>((resolve) => {
      socket.on('data', (chunk: Buffer) => {
        for (const frame of splitter.push(chunk)) {
          if (frame.kind === 'line') lines.push(frame.text);
        }
        if (lines.length >= 2) resolve();
      });
    });
    await new Promise<void>((resolve) => socket.once('connect', () => resolve()));

    socket.write('{oops\n{"type":"join","da');
    socket.write('ta":{"username":"Raw"}}\n');
    await received;
    socket.destroy();

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { type: 'error', data: { code: 'invalid_json', message: 'Invalid JSON format.' } },
      { type: 'join_ack', data: { status: 'waiting', message: 'Waiting for an opponent...' } },
    ]);
  });

  it('refuses connections beyond the worker limit', async () => {
    await startGateway(1);
    await join('Alice');

    const late = await join('Late');
    expect((await late.nextMessage('error')).data).toEqual({
      code: 'server_full',
      message: 'Server is full. Try again later.',
    });
    expect(ctx.capacity.inUse).toBe(1);
  });
});
