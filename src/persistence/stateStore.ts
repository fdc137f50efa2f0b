import { promises as fs } from "node:fs";
import path from "node:path";
import { isPersistedEngineState, type PersistedEngineState } from "./persistedState.js";
import { errorCode, errorMessage } from "../utils/errors.js";

function getDefaultStateFile(instanceId: string): string {
  return `/tmp/band-engine-state-${instanceId}.json`;
}

export class StateStore {
  private stateFile: string;

  constructor(instanceId: string, stateFile?: string) {
    this.stateFile = stateFile || getDefaultStateFile(instanceId);
  }

  getPath(): string {
    return this.stateFile;
  }

  async load(): Promise<PersistedEngineState | null> {
    try {
      const raw = await fs.readFile(this.stateFile, "utf8");
      const parsed: unknown = JSON.parse(raw);

      if (!isPersistedEngineState(parsed)) {
        console.warn(`[persist] Unsupported or malformed state in ${this.stateFile}, ignoring`);
        return null;
      }

      return parsed;
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        // File doesn't exist yet - that's fine
        return null;
      }
      console.warn(`[persist] Failed to load state: ${errorMessage(err)}`);
      return null;
    }
  }

  async save(state: PersistedEngineState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
      const tmp = `${this.stateFile}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf8");
      await fs.rename(tmp, this.stateFile);
    } catch (err) {
      console.warn(`[persist] Failed to save state: ${errorMessage(err)}`);
      throw err;
    }
  }
}
