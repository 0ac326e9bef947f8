import type { Logger } from "pino";
import { ErrorKind, isCurationError, toIOFailure } from "../errors";
import { logger } from "../logger";
import type { DocumentStage, RecordKey, Stage, Status } from "../types/records";
import type { DeleteScope, PublishSynchronizer, SyncScope } from "./publishSynchronizer";
import type { RecordChanges, StagingStateMachine, SubmitRequest } from "./stagingStateMachine";

export type ServiceResult<T> =
  | { success: true; data: T }
  | { success: false; error: { kind: ErrorKind; message: string; details?: Record<string, unknown> } };

/**
 * Boundary used by the HTTP layer. Every call resolves to a result object; nothing
 * thrown by the core escapes.
 */
export class CurationService {
  private readonly log: Logger;

  constructor(
    private readonly machine: StagingStateMachine,
    private readonly synchronizer: PublishSynchronizer,
    parent: Logger = logger,
  ) {
    this.log = parent.child({ component: "curation-service" });
  }

  submit(request: SubmitRequest) {
    return this.run("submit", () => this.machine.submit(request));
  }

  approve(key: RecordKey, actor: string) {
    return this.run("approve", () => this.machine.approve(key, actor));
  }

  reject(key: RecordKey, reason: string, actor: string) {
    return this.run("reject", () => this.machine.reject(key, reason, actor));
  }

  approveAll(stage: Stage, filename: string | undefined, actor: string) {
    return this.run("approveAll", () => this.machine.approveAll(stage, filename, actor));
  }

  update(key: RecordKey, changes: RecordChanges, actor: string) {
    return this.run("update", () => this.machine.update(key, changes, actor));
  }

  list(stage: Stage, status: Status) {
    return this.run("list", () => this.machine.list(stage, status));
  }

  listChunkGroups(status: Status) {
    return this.run("listChunkGroups", () => this.machine.listChunkGroups(status));
  }

  get(status: Status, key: RecordKey) {
    return this.run("get", () => this.machine.get(status, key));
  }

  stats() {
    return this.run("stats", () => this.machine.stats());
  }

  danglingLineage() {
    return this.run("danglingLineage", () => this.machine.findDanglingLineage());
  }

  syncAll(scope: SyncScope = {}) {
    return this.run("syncAll", () => this.synchronizer.syncAll(scope));
  }

  deleteApproved(filename: string, scope: DeleteScope, actor: string) {
    return this.run("deleteApproved", () => this.synchronizer.deleteApproved(filename, scope, actor));
  }

  approvedFiles() {
    return this.run("approvedFiles", () => this.synchronizer.approvedFiles());
  }

  publishedUrl(stage: DocumentStage, filename: string, expiresInSeconds?: number) {
    return this.run("publishedUrl", async () => ({
      url: await this.synchronizer.publishedUrl(stage, filename, expiresInSeconds),
    }));
  }

  remoteFiles(stage: Stage) {
    return this.run("remoteFiles", () => this.synchronizer.remoteFiles(stage));
  }

  remoteContent(stage: DocumentStage, filename: string) {
    return this.run("remoteContent", async () => ({
      filename,
      content: await this.synchronizer.remoteContent(stage, filename),
    }));
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return { success: true, data: await fn() };
    } catch (error) {
      if (!isCurationError(error)) {
        this.log.error({ err: error, operation }, "Unexpected failure");
      }
      const failure = toIOFailure(error, `${operation} failed`);
      return {
        success: false,
        error: { kind: failure.kind, message: failure.message, details: failure.details },
      };
    }
  }
}
