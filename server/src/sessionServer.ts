import { opponentOf, type PieceKind, type Player } from "../../src/types.ts";
import { applyMove } from "../../src/game/applyMove.ts";
import { boardToText } from "../../src/game/boardText.ts";
import { UnknownGameError } from "../../src/game/errors.ts";
import { checkGameEnd, draw, winFor, type GameEnd } from "../../src/game/gameOver.ts";
import { MoveHistory } from "../../src/game/moveHistory.ts";
import type { Move } from "../../src/game/moveTypes.ts";
import { promote, promotingPlayer } from "../../src/game/promote.ts";
import { createInitialGameState, type GameState } from "../../src/game/state.ts";
import type { ClientCommand, ClientConnection, ConnectionId, GameId } from "../../src/shared/protocol.ts";
import { serializeWireGameState, squareToWire } from "../../src/shared/wireState.ts";
import { silentLogger, type Logger } from "./log.ts";
import { secureRandomInt, type RandomInt } from "./secureRandom.ts";

export type ActiveGame = {
  id: GameId;
  white: ClientConnection;
  black: ClientConnection;
  state: GameState;
  history: MoveHistory;
  /** Side with an open draw offer; cleared by any completed move. */
  drawOfferedBy: Player | null;
};

export type SessionRegistry = {
  /** Arrival order; pairing picks from it at random. */
  waitingQueue: ClientConnection[];
  connectionToGame: Map<ConnectionId, GameId>;
  games: Map<GameId, ActiveGame>;
  nextGameId: GameId;
};

export type SessionStats = {
  queued: number;
  activeGames: number;
};

export function createSessionRegistry(): SessionRegistry {
  return { waitingQueue: [], connectionToGame: new Map(), games: new Map(), nextGameId: 1 };
}

export type SessionServerOpts = {
  registry?: SessionRegistry;
  randomInt?: RandomInt;
  logger?: Logger;
};

/**
 * Matchmaking plus every running game. Single-threaded: callers feed it one
 * event at a time and it finishes each before returning.
 */
export class SessionServer {
  readonly registry: SessionRegistry;
  private readonly randomInt: RandomInt;
  private readonly log: Logger;

  constructor(opts: SessionServerOpts = {}) {
    this.registry = opts.registry ?? createSessionRegistry();
    this.randomInt = opts.randomInt ?? secureRandomInt;
    this.log = opts.logger ?? silentLogger;
  }

  connect(conn: ClientConnection): void {
    this.registry.waitingQueue.push(conn);
    this.log.debug(`queued connection=${conn.id} waiting=${this.registry.waitingQueue.length}`);
  }

  /** Pairs queued connections two at a time until fewer than two remain. */
  pairWaiting(): ActiveGame[] {
    const queue = this.registry.waitingQueue;
    const started: ActiveGame[] = [];

    while (queue.length >= 2) {
      const [first] = queue.splice(this.randomInt(queue.length), 1);
      const [second] = queue.splice(this.randomInt(queue.length), 1);
      if (!first || !second) break;

      const [white, black] = this.randomInt(2) === 0 ? [first, second] : [second, first];
      const game: ActiveGame = {
        id: this.registry.nextGameId++,
        white,
        black,
        state: createInitialGameState(),
        history: new MoveHistory(),
        drawOfferedBy: null,
      };
      this.registry.games.set(game.id, game);
      this.registry.connectionToGame.set(white.id, game.id);
      this.registry.connectionToGame.set(black.id, game.id);

      white.send({ type: "MatchFound", color: "W" });
      black.send({ type: "MatchFound", color: "B" });
      this.log.info(`game ${game.id} started white=${white.id} black=${black.id}`);
      started.push(game);
    }

    return started;
  }

  handleCommand(conn: ClientConnection, command: ClientCommand): void {
    const game = this.gameFor(conn.id);

    if (!game) {
      if (command.type === "Reconnect") {
        this.removeFromQueue(conn.id);
        conn.disconnect();
        return;
      }
      this.log.debug(`dropped ${command.type}`, new UnknownGameError(`Connection ${conn.id} is not in a game`));
      return;
    }

    try {
      this.dispatch(game, conn, command);
    } catch (err) {
      this.abortGame(game, err);
    }
  }

  /** The transport lost `conn`. A player still in a game forfeits it. */
  disconnect(conn: ClientConnection): void {
    const game = this.gameFor(conn.id);
    if (!game) {
      this.registry.connectionToGame.delete(conn.id);
      this.removeFromQueue(conn.id);
      return;
    }

    const color = this.colorOf(game, conn.id);
    this.log.info(`game ${game.id}: ${conn.id} disconnected`);
    this.removeGame(game);
    const opponent = this.connectionOf(game, opponentOf(color));
    opponent.send({ type: "GameEnded", ...winFor(opponentOf(color), "Resignation") });
    opponent.disconnect();
  }

  stats(): SessionStats {
    return { queued: this.registry.waitingQueue.length, activeGames: this.registry.games.size };
  }

  private dispatch(game: ActiveGame, conn: ClientConnection, command: ClientCommand): void {
    const color = this.colorOf(game, conn.id);
    switch (command.type) {
      case "Move":
        this.onMove(game, conn, color, command.move);
        return;
      case "Promote":
        this.onPromote(game, conn, color, command.kind);
        return;
      case "RequestDraw":
        this.onRequestDraw(game, color);
        return;
      case "Resign":
        this.endGame(game, winFor(opponentOf(color), "Resignation"));
        return;
      case "Reconnect":
        this.sendSnapshot(conn, game);
        return;
    }
  }

  private onMove(game: ActiveGame, conn: ClientConnection, color: Player, move: Move): void {
    if (color !== game.state.turn) {
      this.sendSnapshot(conn, game);
      return;
    }

    const outcome = applyMove(game.state, move);
    if (!outcome.ok) {
      this.log.debug(`game ${game.id}: rejected move from ${conn.id}: ${outcome.error.message}`);
      this.sendSnapshot(conn, game);
      return;
    }

    game.state = outcome.state;
    game.drawOfferedBy = null;
    this.connectionOf(game, opponentOf(color)).send({
      type: "MoveApplied",
      from: squareToWire(move.from),
      to: squareToWire(move.to),
    });

    // The move completes once the pawn has been promoted.
    if (game.state.pendingPromotion) return;
    this.completeMove(game);
  }

  private onPromote(game: ActiveGame, conn: ClientConnection, color: Player, kind: PieceKind): void {
    if (promotingPlayer(game.state) !== color) {
      this.sendSnapshot(conn, game);
      return;
    }

    const outcome = promote(game.state, kind);
    if (!outcome.ok) {
      this.log.debug(`game ${game.id}: rejected promotion from ${conn.id}: ${outcome.error.message}`);
      this.sendSnapshot(conn, game);
      return;
    }

    game.state = outcome.state;
    // Offers made while the promotion was pending lapse with the completed move.
    game.drawOfferedBy = null;
    this.connectionOf(game, opponentOf(color)).send({ type: "PromotionApplied", kind: outcome.kind });
    this.completeMove(game);
  }

  private onRequestDraw(game: ActiveGame, color: Player): void {
    if (game.drawOfferedBy === null) {
      game.drawOfferedBy = color;
      this.connectionOf(game, opponentOf(color)).send({ type: "DrawOffered" });
      return;
    }
    if (game.drawOfferedBy !== color) this.endGame(game, draw("Agreement"));
  }

  private completeMove(game: ActiveGame): void {
    game.history.push(game.state.board);
    const end = checkGameEnd(game.state, game.history);
    if (end) this.endGame(game, end);
  }

  private endGame(game: ActiveGame, end: GameEnd): void {
    this.log.info(`game ${game.id} ended: ${end.result} (${end.reason})`);
    this.removeGame(game);
    for (const conn of [game.white, game.black]) {
      conn.send({ type: "GameEnded", result: end.result, reason: end.reason });
      conn.disconnect();
    }
  }

  /** Tears down one game after a broken invariant; other games carry on. */
  private abortGame(game: ActiveGame, err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    this.log.error(`game ${game.id} aborted: ${message}\n${boardToText(game.state.board)}`);
    this.removeGame(game);
    game.white.disconnect();
    game.black.disconnect();
  }

  private sendSnapshot(conn: ClientConnection, game: ActiveGame): void {
    conn.send({ type: "StateSnapshot", state: serializeWireGameState(game.state) });
  }

  private gameFor(id: ConnectionId): ActiveGame | null {
    const gameId = this.registry.connectionToGame.get(id);
    if (gameId === undefined) return null;
    return this.registry.games.get(gameId) ?? null;
  }

  private removeGame(game: ActiveGame): void {
    this.registry.games.delete(game.id);
    this.registry.connectionToGame.delete(game.white.id);
    this.registry.connectionToGame.delete(game.black.id);
  }

  private removeFromQueue(id: ConnectionId): void {
    const queue = this.registry.waitingQueue;
    const idx = queue.findIndex((c) => c.id === id);
    if (idx >= 0) queue.splice(idx, 1);
  }

  private colorOf(game: ActiveGame, id: ConnectionId): Player {
    return game.white.id === id ? "W" : "B";
  }

  private connectionOf(game: ActiveGame, color: Player): ClientConnection {
    return color === "W" ? game.white : game.black;
  }
}
