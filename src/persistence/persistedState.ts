import type { Position } from "../types.js";

/**
 * Persisted state schema (versioned)
 */
export interface PersistedEngineStateV1 {
  version: 1;
  instanceId: string;
  savedAt: number;
  tradingDate: string; // exchange-local "YYYY-MM-DD"
  dailyPnl: number;
  tradesToday: number;
  openPosition: Position | null;
}

export type PersistedEngineState = PersistedEngineStateV1;

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function isPosition(value: unknown): value is Position {
  if (!isObject(value)) return false;
  const contract: unknown = Reflect.get(value, "contract");
  return (
    typeof Reflect.get(value, "tradeId") === "string" &&
    (Reflect.get(value, "side") === "CALL" || Reflect.get(value, "side") === "PUT") &&
    typeof Reflect.get(value, "entryPrice") === "number" &&
    typeof Reflect.get(value, "entryTime") === "number" &&
    isObject(contract) &&
    typeof Reflect.get(contract, "symbol") === "string"
  );
}

export function isPersistedEngineState(value: unknown): value is PersistedEngineState {
  if (!isObject(value)) return false;
  const position: unknown = Reflect.get(value, "openPosition");
  return (
    Reflect.get(value, "version") === 1 &&
    typeof Reflect.get(value, "instanceId") === "string" &&
    typeof Reflect.get(value, "savedAt") === "number" &&
    typeof Reflect.get(value, "tradingDate") === "string" &&
    typeof Reflect.get(value, "dailyPnl") === "number" &&
    typeof Reflect.get(value, "tradesToday") === "number" &&
    (position === null || isPosition(position))
  );
}
