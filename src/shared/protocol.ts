import { PIECE_KINDS, type PieceKind, type Player } from "../types.ts";
import type { EndReason, GameResult } from "../game/gameOver.ts";
import type { Move } from "../game/moveTypes.ts";
import { squareFromWire, type WireGameState, type WireSquare } from "./wireState.ts";

export type ConnectionId = string;
export type GameId = number;

// --- Client -> server ---

export type MoveCommand = { type: "Move"; move: Move };
export type PromoteCommand = { type: "Promote"; kind: PieceKind };
export type RequestDrawCommand = { type: "RequestDraw" };
export type ResignCommand = { type: "Resign" };
export type ReconnectCommand = { type: "Reconnect" };

/** Disconnect is implicit: the transport reports it, clients never send it. */
export type ClientCommand = MoveCommand | PromoteCommand | RequestDrawCommand | ResignCommand | ReconnectCommand;

// --- Server -> client ---

export type ServerMessage =
  | { type: "MatchFound"; color: Player }
  | { type: "MoveApplied"; from: WireSquare; to: WireSquare }
  | { type: "PromotionApplied"; kind: PieceKind }
  /** Full state; doubles as the silent rejection of a bad command and as reconnect resync. */
  | { type: "StateSnapshot"; state: WireGameState }
  | { type: "DrawOffered" }
  | { type: "GameEnded"; result: GameResult; reason: EndReason };

/**
 * What the core needs from a transport-owned connection.
 * The core never opens or closes sockets itself.
 */
export interface ClientConnection {
  readonly id: ConnectionId;
  send(message: ServerMessage): void;
  disconnect(): void;
}

function isPieceKind(raw: unknown): raw is PieceKind {
  return typeof raw === "string" && PIECE_KINDS.some((k) => k === raw);
}

/** Decoded JSON -> command, or null when malformed. */
export function parseClientCommand(raw: unknown): ClientCommand | null {
  if (!raw || typeof raw !== "object" || !("type" in raw)) return null;

  switch (raw.type) {
    case "Move": {
      if (!("from" in raw) || !("to" in raw)) return null;
      const from = squareFromWire(raw.from);
      const to = squareFromWire(raw.to);
      if (!from || !to) return null;
      return { type: "Move", move: { from, to } };
    }
    case "Promote": {
      if (!("kind" in raw) || !isPieceKind(raw.kind)) return null;
      return { type: "Promote", kind: raw.kind };
    }
    case "RequestDraw":
      return { type: "RequestDraw" };
    case "Resign":
      return { type: "Resign" };
    case "Reconnect":
      return { type: "Reconnect" };
    default:
      return null;
  }
}
