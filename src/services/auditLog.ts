import type { Logger } from "pino";
import { logger } from "../logger";
import type { RecordKey } from "../types/records";

export type AuditAction = "approve" | "reject" | "update" | "delete";

/** Every chunk of one source, for actions that cover the whole group. */
export interface ChunkSourceKey {
  stage: "chunked";
  filename: string;
}

export interface AuditEntry {
  action: AuditAction;
  key: RecordKey | ChunkSourceKey;
  actor: string;
  reason?: string;
  details?: Record<string, unknown>;
}

export interface AuditLog {
  record(entry: AuditEntry): void;
}

export class LoggerAuditLog implements AuditLog {
  private readonly log: Logger;

  constructor(parent: Logger = logger) {
    this.log = parent.child({ component: "audit" });
  }

  record(entry: AuditEntry) {
    this.log.info(
      {
        action: entry.action,
        stage: entry.key.stage,
        filename: entry.key.filename,
        chunkIndex: "chunkIndex" in entry.key ? entry.key.chunkIndex : undefined,
        actor: entry.actor,
        reason: entry.reason,
        ...entry.details,
      },
      `moderation ${entry.action}`,
    );
  }
}
