/**
 * Message processing ledger.
 *
 * Records the outcome per message source so completed messages are skipped
 * on the next run. Uses indexed lookup when the SQLite backend is enabled.
 */

import { createHash } from "node:crypto";
import { z } from "zod";
import { createStorage, storageDirs, type StorageOperations } from "./base.js";
import { getStorageBackend } from "./repository.js";
import { createSqliteRepository } from "./sqlite.js";
import type { CreateMessageRecordInput, MessageRecord } from "../types/report.js";

const messageRecordSchema = z.object({
  id: z.string().min(1),
  source: z.string(),
  messageId: z.string().nullable(),
  status: z.enum(["complete", "partial", "failed"]),
  attachmentCount: z.number().int().min(0),
  failedAttachments: z.number().int().min(0),
  lastError: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export function parseMessageRecord(raw: unknown): MessageRecord {
  return messageRecordSchema.parse(raw);
}

/**
 * Ledger id for a message source.
 */
export function messageRecordId(source: string): string {
  return createHash("sha256").update(source).digest("hex").slice(0, 24);
}

export interface MessageLedger {
  find(id: string): Promise<MessageRecord | null>;
  upsert(input: CreateMessageRecordInput): Promise<MessageRecord>;
  list(): Promise<MessageRecord[]>;
}

export class StorageMessageLedger implements MessageLedger {
  constructor(
    private readonly storage: StorageOperations<MessageRecord>,
    private readonly now: () => Date = () => new Date()
  ) {}

  find(id: string): Promise<MessageRecord | null> {
    return this.storage.get(id);
  }

  async upsert(input: CreateMessageRecordInput): Promise<MessageRecord> {
    const existing = await this.storage.get(input.id);
    const now = this.now();
    const record: MessageRecord = {
      ...input,
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    return this.storage.save(record);
  }

  list(): Promise<MessageRecord[]> {
    return this.storage.getAll();
  }
}

/**
 * Ledger for the configured storage backend.
 */
export function createMessageLedger(): MessageLedger {
  if (getStorageBackend() === "sqlite") {
    return new StorageMessageLedger(
      createSqliteRepository<MessageRecord>(
        "message_records",
        [
          { column: "source", property: "source" },
          { column: "message_id", property: "messageId" },
          { column: "status", property: "status" },
        ],
        parseMessageRecord
      )
    );
  }
  return new StorageMessageLedger(
    createStorage<MessageRecord>(storageDirs().messages, parseMessageRecord)
  );
}
