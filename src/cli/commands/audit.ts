import { Command, Option } from "clipanion";
import * as t from "typanion";
import { getStateDir } from "../../config/paths.js";
import { TwinDB } from "../../storage/db.js";
import { AuditLog } from "../../audit/log.js";
import type { AuditRecord } from "../../audit/types.js";
import { ConversationId, DecisionId } from "../../utils/types.js";

export class AuditCommand extends Command {
  static override paths = [["audit"]];

  static override usage = Command.Usage({
    description: "Print audit records in the order they were written",
    examples: [
      ["Last entries", "twin audit --limit 20"],
      ["One conversation", "twin audit --conversation 9b1e..."],
    ],
  });

  conversation = Option.String("--conversation", { required: false });

  decision = Option.String("--decision", { required: false });

  limit = Option.String("--limit", {
    required: false,
    validator: t.cascade(t.isNumber(), t.isInteger(), t.isInInclusiveRange(1, 1000)),
  });

  json = Option.Boolean("--json", false, { description: "One JSON object per line" });

  async execute(): Promise<void> {
    const db = new TwinDB(getStateDir());
    try {
      const records = new AuditLog(db).query({
        conversationId: this.conversation === undefined ? undefined : ConversationId.make(this.conversation),
        decisionId: this.decision === undefined ? undefined : DecisionId.make(this.decision),
        limit: this.limit,
      });
      for (const record of records) {
        this.context.stdout.write((this.json ? JSON.stringify(record) : formatRecord(record)) + "\n");
      }
    } finally {
      db.close();
    }
  }
}

export function formatRecord(record: AuditRecord): string {
  const at = new Date(record.timestamp).toISOString();
  const who = record.actor === "operator" ? `operator:${record.operator ?? "?"}` : "system";
  const states = record.fromState || record.toState ? ` ${record.fromState ?? "-"} -> ${record.toState ?? "-"}` : "";
  const reason = record.reason ? ` (${record.reason})` : "";
  const decision = record.decisionId ? ` ${record.decisionId}` : "";
  return `${at} #${record.id} ${record.action}${decision}${states} by ${who}${reason}`;
}
