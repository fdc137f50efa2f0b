import type { Orchestrator } from "./orchestrator/orchestrator.js";
import { formatStatus } from "./telegram/tradeAlerts.js";

export class CommandHandler {
  constructor(
    private readonly orch: Orchestrator,
    private readonly offsetMinutes: number
  ) {}

  async status(): Promise<string> {
    return formatStatus(this.orch.getStatus(), this.offsetMinutes);
  }

  /**
   * Close the open position at the last traded price of its leg.
   */
  async exit(): Promise<string> {
    const position = this.orch.getStatus().session.position;
    if (!position) {
      return "❌ No open position to exit.";
    }
    const result = await this.orch.manualExit("MANUAL");
    return this.orch.getStatus().session.position ? `❌ ${result}` : `✅ ${result}`;
  }
}
