import * as log from '../utils/logger';
import type { AppConfig } from '../common/config';
import { describeError } from '../common/errors';
import type { BrowserLauncher } from '../browser/page_driver';
import { exportDocument, type ExportResult } from '../overleaf/exporter';
import { uploadDocument, type UploadResult } from '../sharepoint/uploader';

export type StageName = 'export' | 'upload';

export interface PipelineStages {
  exportDocument(config: AppConfig): Promise<ExportResult>;
  uploadDocument(config: AppConfig, filePath: string): Promise<UploadResult>;
}

export type PipelineResult =
  | { ok: true; exitCode: 0; exported: ExportResult; uploaded: UploadResult }
  | { ok: false; exitCode: 1; failedStage: StageName; error: { name: string; message: string } };

export function createBrowserStages(launcher: BrowserLauncher): PipelineStages {
  return {
    exportDocument: (config) => exportDocument(config, launcher),
    uploadDocument: (config, filePath) => uploadDocument(config, launcher, filePath),
  };
}

function stageFailed(stage: StageName, error: unknown): PipelineResult {
  const described = describeError(error);
  log.error(`[pipeline] stage=${stage} status=failed error=${described.name} message=${described.message}`);
  log.logStructured('pipeline_result', { ok: false, failed_stage: stage, error: described.name });
  return { ok: false, exitCode: 1, failedStage: stage, error: described };
}

/** Export, then upload what was exported. The first failure ends the run. */
export async function runPipeline(config: AppConfig, stages: PipelineStages): Promise<PipelineResult> {
  let exported: ExportResult;
  log.info('[pipeline] stage=export status=started');
  try {
    exported = await stages.exportDocument(config);
  } catch (error) {
    return stageFailed('export', error);
  }
  log.success(`[pipeline] stage=export status=success file=${exported.path} size=${exported.sizeBytes}`);

  let uploaded: UploadResult;
  log.info('[pipeline] stage=upload status=started');
  try {
    uploaded = await stages.uploadDocument(config, exported.path);
  } catch (error) {
    return stageFailed('upload', error);
  }
  log.success(`[pipeline] stage=upload status=success name=${uploaded.uploadedName}`);

  log.logStructured('pipeline_result', {
    ok: true,
    file: exported.path,
    size_bytes: exported.sizeBytes,
    uploaded_name: uploaded.uploadedName,
    login_performed: uploaded.loginPerformed,
    session_restored: uploaded.sessionRestored,
  });
  return { ok: true, exitCode: 0, exported, uploaded };
}
