import { config } from "./config";
import { logger } from "./logger";
import { buildServer } from "./server";
import { FileRecordStore } from "./storage/fileRecordStore";
import { FilePushLedger } from "./repositories/filePushLedger";
import { PgPushLedger } from "./repositories/pushLedgerRepository";
import { LoggerAuditLog } from "./services/auditLog";
import { ChunkSequencer } from "./services/chunkSequencer";
import { CurationService } from "./services/curationService";
import { S3DatasetStore } from "./services/datasetStoreClient";
import { PublishSynchronizer } from "./services/publishSynchronizer";
import { StagingStateMachine } from "./services/stagingStateMachine";
import type { PushLedger } from "./types/ledger";

async function createLedger(): Promise<PushLedger> {
  if (config.ledger.backend === "file") {
    return new FilePushLedger(config.ledger.file);
  }
  // loaded lazily so the file backend never opens a pool
  const { pool } = await import("./db");
  const { runMigrations } = await import("./migrate");
  await runMigrations();
  return new PgPushLedger(pool);
}

async function main() {
  const store = new FileRecordStore({
    pendingDir: config.storage.pendingDir,
    approvedDir: config.storage.approvedDir,
    journalDir: config.storage.journalDir,
  });
  const recovered = await store.recover();
  if (recovered > 0) {
    logger.warn({ recovered }, "Resolved interrupted moves from the journal");
  }

  const audit = new LoggerAuditLog();
  const machine = new StagingStateMachine({ store, sequencer: new ChunkSequencer(store), audit });
  const synchronizer = new PublishSynchronizer({
    store,
    ledger: await createLedger(),
    client: new S3DatasetStore(config.dataset),
    lineage: machine,
    audit,
    timeoutMs: config.publish.timeoutMs,
    concurrency: config.publish.concurrency,
  });
  await synchronizer.pruneLedger();

  const app = await buildServer({ service: new CurationService(machine, synchronizer), apiKey: config.apiKey });
  const address = await app.listen({ port: config.port, host: "0.0.0.0" });
  app.log.info(`Server listening on ${address}`);
}

main().catch((err) => {
  logger.error({ err }, "Failed to start server");
  process.exit(1);
});
