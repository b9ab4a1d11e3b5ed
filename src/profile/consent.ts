import type { TwinDB } from "../storage/db.js";
import type { AuditLog } from "../audit/log.js";
import { ContactId } from "../utils/types.js";
import { NotFoundError } from "../utils/errors.js";
import type { ConsentChange, ConsentStatus, Contact } from "./types.js";

interface ContactRow {
  id: string;
  channel_id: string;
  sender_id: string;
  display_name: string | null;
  consent: ConsentStatus;
  profile_id: string;
  created_at: number;
  updated_at: number;
}

interface ConsentHistoryRow {
  id: number;
  contact_id: string;
  previous: ConsentStatus;
  status: ConsentStatus;
  actor: string;
  timestamp: number;
}

export interface EnsureContactParams {
  readonly channelId: string;
  readonly senderId: string;
  readonly displayName?: string | null;
  readonly profileId: string;
}

/** Per-contact consent records. New contacts always start as `unknown`. */
export class ConsentRegistry {
  private readonly db;

  constructor(
    private readonly twinDb: TwinDB,
    private readonly audit: AuditLog,
  ) {
    this.db = twinDb.raw();
  }

  ensureContact(params: EnsureContactParams): Contact {
    const id = ContactId.forSender(params.channelId, params.senderId);
    const now = Date.now();
    this.db
      .prepare(
        `INSERT INTO contacts (id, channel_id, sender_id, display_name, consent, profile_id, created_at, updated_at)
         VALUES (?, ?, ?, ?, 'unknown', ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           display_name = COALESCE(excluded.display_name, contacts.display_name),
           updated_at = excluded.updated_at`,
      )
      .run(id, params.channelId, params.senderId, params.displayName ?? null, params.profileId, now, now);
    return this.require(id);
  }

  get(contactId: ContactId): Contact | null {
    const row = this.db
      .prepare("SELECT * FROM contacts WHERE id = ?")
      .get(contactId) as ContactRow | undefined;
    return row ? toContact(row) : null;
  }

  require(contactId: ContactId): Contact {
    const contact = this.get(contactId);
    if (!contact) throw new NotFoundError("contact", contactId);
    return contact;
  }

  list(limit = 200): Contact[] {
    const rows = this.db
      .prepare("SELECT * FROM contacts ORDER BY updated_at DESC LIMIT ?")
      .all(limit) as ContactRow[];
    return rows.map(toContact);
  }

  setConsent(contactId: ContactId, status: ConsentStatus, actor: string): Contact {
    return this.twinDb.transaction(() => {
      const current = this.require(contactId);
      if (current.consent === status) return current;

      const now = Date.now();
      this.db
        .prepare("UPDATE contacts SET consent = ?, updated_at = ? WHERE id = ? AND consent = ?")
        .run(status, now, contactId, current.consent);
      this.db
        .prepare(
          `INSERT INTO consent_history (contact_id, previous, status, actor, timestamp)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(contactId, current.consent, status, actor, now);
      this.audit.append({
        action: "consent_changed",
        actor: actor === "system" ? "system" : "operator",
        operator: actor === "system" ? null : actor,
        reason: `${current.consent} -> ${status}`,
        detail: { contactId },
      });
      return this.require(contactId);
    });
  }

  setProfile(contactId: ContactId, profileId: string): Contact {
    const result = this.db
      .prepare("UPDATE contacts SET profile_id = ?, updated_at = ? WHERE id = ?")
      .run(profileId, Date.now(), contactId);
    if (result.changes === 0) throw new NotFoundError("contact", contactId);
    return this.require(contactId);
  }

  history(contactId: ContactId, limit = 50): ConsentChange[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM (
           SELECT * FROM consent_history WHERE contact_id = ? ORDER BY id DESC LIMIT ?
         ) ORDER BY id ASC`,
      )
      .all(contactId, limit) as ConsentHistoryRow[];
    return rows.map((r) => ({
      id: r.id,
      contactId: ContactId.make(r.contact_id),
      previous: r.previous,
      status: r.status,
      actor: r.actor,
      timestamp: r.timestamp,
    }));
  }
}

function toContact(row: ContactRow): Contact {
  return {
    id: ContactId.make(row.id),
    channelId: row.channel_id,
    senderId: row.sender_id,
    displayName: row.display_name,
    consent: row.consent,
    profileId: row.profile_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
