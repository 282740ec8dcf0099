export type ChessErrorCode = "INVALID_MOVE" | "UNKNOWN_GAME" | "INVALID_PROMOTION" | "INVARIANT";

export class ChessError extends Error {
  readonly code: ChessErrorCode;

  constructor(code: ChessErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidMoveError extends ChessError {
  constructor(message = "Invalid move") {
    super("INVALID_MOVE", message);
  }
}

export class UnknownGameError extends ChessError {
  constructor(message = "Connection is not in a game") {
    super("UNKNOWN_GAME", message);
  }
}

export class InvalidPromotionError extends ChessError {
  constructor(message = "Invalid promotion") {
    super("INVALID_PROMOTION", message);
  }
}

/** A position the rules can never reach, e.g. a side without a king. */
export class InvariantError extends ChessError {
  constructor(message: string) {
    super("INVARIANT", message);
  }
}
