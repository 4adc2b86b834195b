import { join } from 'path';
import { loadWorkflowSettings } from '../../config/workflow.js';
import { FileArtifactStore } from '../storage/artifact.store.js';
import { TimelineService } from '../timeline/timeline.service.js';
import { PipelineService } from './pipeline.service.js';

export * from './pipeline.service.js';

export interface PipelineServices {
  pipeline: PipelineService;
  store: FileArtifactStore;
  timeline: TimelineService;
}

export function timelinePath(dataDir: string): string {
  return join(dataDir, 'timeline', 'activity.jsonl');
}

/**
 * Load the workflow settings once and wire the services for one run
 */
export async function createPipelineServices(options: {
  configDir: string;
  dataDir: string;
}): Promise<PipelineServices> {
  const settings = loadWorkflowSettings(options.configDir);
  const store = new FileArtifactStore(options.dataDir);
  await store.initialize();
  const timeline = new TimelineService(timelinePath(options.dataDir));

  return {
    pipeline: new PipelineService(settings, store, timeline),
    store,
    timeline,
  };
}
