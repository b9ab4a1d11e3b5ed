import { Cli } from "clipanion";
import { GatewayRunCommand } from "./commands/gateway.js";
import { StatusCommand } from "./commands/status.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";
import {
  ProfileInitCommand,
  ProfileShowCommand,
  ProfileRedlineAddCommand,
  ProfileRedlineRemoveCommand,
  ProfileTopicAddCommand,
} from "./commands/profile.js";
import {
  ApprovalsListCommand,
  ApprovalsApproveCommand,
  ApprovalsEditCommand,
  ApprovalsDenyCommand,
} from "./commands/approvals.js";
import { ConsentSetCommand, ConsentShowCommand } from "./commands/consent.js";
import { AuditCommand } from "./commands/audit.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Twin",
    binaryName: "twin",
    binaryVersion: "0.1.0",
  });

  cli.register(GatewayRunCommand);

  // Status
  cli.register(StatusCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Profile commands
  cli.register(ProfileInitCommand);
  cli.register(ProfileShowCommand);
  cli.register(ProfileRedlineAddCommand);
  cli.register(ProfileRedlineRemoveCommand);
  cli.register(ProfileTopicAddCommand);

  // Approval commands
  cli.register(ApprovalsListCommand);
  cli.register(ApprovalsApproveCommand);
  cli.register(ApprovalsEditCommand);
  cli.register(ApprovalsDenyCommand);

  // Consent commands
  cli.register(ConsentSetCommand);
  cli.register(ConsentShowCommand);

  // Audit log
  cli.register(AuditCommand);

  return cli;
}
