import { Command, Option } from "clipanion";
import * as t from "typanion";
import { getStateDir } from "../../config/paths.js";
import { TwinDB } from "../../storage/db.js";
import { AuditLog } from "../../audit/log.js";
import { ConsentRegistry } from "../../profile/consent.js";
import { ContactId } from "../../utils/types.js";
import { errorMessage } from "../../utils/errors.js";

const isConsentStatus = t.isEnum(["unknown", "granted", "denied", "revoked"]);

export class ConsentSetCommand extends Command {
  static override paths = [["consent", "set"]];

  static override usage = Command.Usage({
    description: "Record whether a contact may receive automatic replies",
    examples: [["Grant consent", "twin consent set webhook:alice granted"]],
  });

  contactId = Option.String({ name: "contact-id", required: true });

  status = Option.String({ name: "status", required: true });

  operator = Option.String("--operator", {
    description: "Name recorded in the consent history",
    required: false,
  });

  async execute(): Promise<void> {
    const status = this.status;
    if (!isConsentStatus(status)) {
      this.context.stdout.write(`Unknown consent status "${status}" (expected unknown, granted, denied or revoked)\n`);
      process.exitCode = 1;
      return;
    }

    const db = new TwinDB(getStateDir());
    try {
      const registry = new ConsentRegistry(db, new AuditLog(db));
      const contact = registry.setConsent(
        ContactId.make(this.contactId),
        status,
        this.operator ?? "cli",
      );
      this.context.stdout.write(`${contact.id}: consent ${contact.consent}\n`);
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    } finally {
      db.close();
    }
  }
}

export class ConsentShowCommand extends Command {
  static override paths = [["consent", "show"]];

  static override usage = Command.Usage({
    description: "Show a contact's consent and its history",
    examples: [["Show consent", "twin consent show webhook:alice"]],
  });

  contactId = Option.String({ name: "contact-id", required: true });

  async execute(): Promise<void> {
    const db = new TwinDB(getStateDir());
    try {
      const registry = new ConsentRegistry(db, new AuditLog(db));
      const id = ContactId.make(this.contactId);
      const contact = registry.require(id);
      this.context.stdout.write(`${contact.id}: consent ${contact.consent} (profile ${contact.profileId})\n`);
      for (const change of registry.history(id)) {
        const at = new Date(change.timestamp).toISOString();
        this.context.stdout.write(`  ${at}  ${change.previous} -> ${change.status}  by ${change.actor}\n`);
      }
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    } finally {
      db.close();
    }
  }
}
