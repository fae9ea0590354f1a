import { PipelineRecord } from '../pipeline.record';

/**
 * Per-call context handed in by the host pipeline.
 */
export interface ProcessContext {
  /**
   * Aborting the signal cancels a pending request
   */
  signal?: AbortSignal;

  /**
   * Point in time after which the caller no longer wants a reply
   */
  deadline?: Date;
}

/**
 * A pipeline stage that maps one record to one record.
 */
export interface Processor {
  process(context: ProcessContext, record: PipelineRecord): Promise<PipelineRecord>;
  close(context?: ProcessContext): Promise<void>;
}
