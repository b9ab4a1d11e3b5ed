import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { getStateDir } from "../../config/paths.js";
import { TwinDB } from "../../storage/db.js";
import { ApprovalQueue } from "../../approval/queue.js";
import { AuditLog } from "../../audit/log.js";
import { DecisionStore } from "../../engine/store.js";
import { errorMessage } from "../../utils/errors.js";
import { DashboardClient, describeFailure, type DashboardResponse } from "../dashboard-client.js";

export class ApprovalsListCommand extends Command {
  static override paths = [["approvals", "list"]];

  static override usage = Command.Usage({
    description: "List replies waiting for approval",
    examples: [["List pending approvals", "twin approvals list"]],
  });

  async execute(): Promise<void> {
    const db = new TwinDB(getStateDir());
    try {
      const queue = new ApprovalQueue(db);
      const decisions = new DecisionStore(db, new AuditLog(db));

      let count = 0;
      for (const request of queue.listPending(Date.now())) {
        const decision = decisions.get(request.decisionId);
        const text = decision?.finalText ?? decision?.candidateText ?? "(no draft; edit required)";
        const due = new Date(request.deadline).toISOString();
        this.context.stdout.write(`${request.id}  due ${due}  [${request.reason}]\n    ${text}\n`);
        count++;
      }
      if (count === 0) {
        this.context.stdout.write("No pending approvals\n");
      }
    } finally {
      db.close();
    }
  }
}

abstract class ResolveCommand extends Command {
  requestId = Option.String({ name: "request-id", required: true });

  operator = Option.String("--operator", {
    description: "Name recorded in the audit log",
    required: false,
  });

  protected async send(action: "approve" | "edit" | "deny", body: Record<string, unknown>): Promise<void> {
    const client = new DashboardClient(loadConfig());
    let res: DashboardResponse;
    try {
      res = await client.request("POST", `/approvals/${encodeURIComponent(this.requestId)}/${action}`, {
        ...body,
        ...(this.operator ? { operator: this.operator } : {}),
      });
    } catch (err) {
      this.context.stdout.write(`Gateway unreachable: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    if (res.status !== 200) {
      this.context.stdout.write(`Could not ${action} ${this.requestId}: ${describeFailure(res)}\n`);
      process.exitCode = 1;
      return;
    }
    const state = res.body !== null && typeof res.body === "object" && "state" in res.body ? String(res.body.state) : "unknown";
    this.context.stdout.write(`${this.requestId}: ${action} -> ${state}\n`);
  }
}

export class ApprovalsApproveCommand extends ResolveCommand {
  static override paths = [["approvals", "approve"]];

  static override usage = Command.Usage({
    description: "Approve a drafted reply and send it",
    examples: [["Approve a request", "twin approvals approve 5f0c..."]],
  });

  async execute(): Promise<void> {
    await this.send("approve", {});
  }
}

export class ApprovalsEditCommand extends ResolveCommand {
  static override paths = [["approvals", "edit"]];

  static override usage = Command.Usage({
    description: "Replace a drafted reply and send the replacement",
    examples: [["Send different text", "twin approvals edit 5f0c... \"See you at 8\""]],
  });

  text = Option.String({ name: "text", required: true });

  async execute(): Promise<void> {
    await this.send("edit", { text: this.text });
  }
}

export class ApprovalsDenyCommand extends ResolveCommand {
  static override paths = [["approvals", "deny"]];

  static override usage = Command.Usage({
    description: "Discard a drafted reply",
    examples: [["Deny a request", "twin approvals deny 5f0c..."]],
  });

  async execute(): Promise<void> {
    await this.send("deny", {});
  }
}
