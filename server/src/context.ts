import { Capacity } from './lib/capacity';
import { Broadcaster } from './services/broadcaster';
import { GameService } from './services/gameService';
import { Matchmaker } from './services/matchmakingService';
import { PlayerRegistry } from './services/playerRegistry';

export interface GameContext {
  registry: PlayerRegistry;
  broadcaster: Broadcaster;
  games: GameService;
  matchmaker: Matchmaker;
  capacity: Capacity;
}

export function createGameContext(maxWorkers: number): GameContext {
  const registry = new PlayerRegistry();
  const broadcaster = new Broadcaster(registry);
  const games = new GameService(registry, broadcaster);
  const matchmaker = new Matchmaker(registry, games);
  return { registry, broadcaster, games, matchmaker, capacity: new Capacity(maxWorkers) };
}
