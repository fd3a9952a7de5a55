export type ErrorCode =
  | 'invalid_json'
  | 'unknown_type'
  | 'missing_data'
  | 'invalid_game'
  | 'not_in_game'
  | 'already_joined'
  | 'invalid_move'
  | 'not_your_turn'
  | 'server_full'
  | 'internal_error';

/**
 * Base class for failures that are reported to the client as an `error`
 * message. None of them closes the connection.
 */
export class GameError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ProtocolError extends GameError {}

export class SessionNotFoundError extends GameError {
  constructor(public readonly gameId: string) {
    super('invalid_game', 'Game not found.');
  }
}

export class NotParticipantError extends GameError {
  constructor(public readonly gameId: string) {
    super('not_in_game', 'You are not a player in this game.');
  }
}

export class AlreadyJoinedError extends GameError {
  constructor() {
    super('already_joined', 'You have already joined a game.');
  }
}
