import { DropboxUploader } from './clients/dropbox.js';
import { InstagramGraphPublisher } from './clients/instagram.js';
import type { IAccountReader } from './clients/types.js';
import {
  getDataDir,
  getRequiredDropboxConfig,
  getRequiredInstagramConfig,
  getTimezone,
} from './config/index.js';
import { ProcessedLedger, ScheduleLedger } from './data/ledger.js';
import { PublishPipeline } from './publish/pipeline.js';
import { ScheduleEditor } from './schedule/editing.js';
import { IngestCoordinator } from './schedule/ingest.js';
import { Rebalancer } from './schedule/rebalance.js';
import { WeeklyTemplate } from './schedule/weeklyTemplate.js';

/**
 * Everything the scheduling core needs, wired from configuration.
 */
export interface CoreServices {
  dataDir: string;
  timeZone: string;
  template: WeeklyTemplate;
  scheduleLedger: ScheduleLedger;
  processedLedger: ProcessedLedger;
  coordinator: IngestCoordinator;
  editor: ScheduleEditor;
  rebalancer: Rebalancer;
}

export function createCoreServices(clock: () => Date = () => new Date()): CoreServices {
  const dataDir = getDataDir();
  const timeZone = getTimezone();
  const template = WeeklyTemplate.fromConfig(clock());
  const scheduleLedger = new ScheduleLedger(dataDir);
  const processedLedger = new ProcessedLedger(dataDir);

  return {
    dataDir,
    timeZone,
    template,
    scheduleLedger,
    processedLedger,
    coordinator: new IngestCoordinator({ scheduleLedger, processedLedger, template, timeZone, clock }),
    editor: new ScheduleEditor({ scheduleLedger, timeZone, clock }),
    rebalancer: new Rebalancer({ scheduleLedger, processedLedger, template, timeZone, clock }),
  };
}

/**
 * The production publish pipeline. Fails with ConfigError when provider
 * credentials are missing.
 */
export function createPublishPipeline(): PublishPipeline {
  return new PublishPipeline({
    uploader: new DropboxUploader(getRequiredDropboxConfig()),
    publisher: new InstagramGraphPublisher(getRequiredInstagramConfig()),
  });
}

export function createAccountReader(): IAccountReader {
  return new InstagramGraphPublisher(getRequiredInstagramConfig());
}
