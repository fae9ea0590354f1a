import { Logger, LoggerService } from '@nestjs/common';

import { MsgHdrs } from 'nats';

import { Interpolator } from './interpolation';
import { MetadataFilter } from './metadata.filter';
import { PipelineRecord } from './pipeline.record';
import { errorMessage, TemplateEvaluationError } from './request-reply.errors';

/**
 * Builds the headers of an outbound request.
 *
 * Templated headers are appended first, in configuration order, followed by the
 * metadata entries the filter selects. Values are appended rather than set, so a
 * metadata key that collides with a templated header name carries both values.
 * Metadata that is not a valid header (a key with spaces, a value with line
 * breaks) is skipped with a warning; a templated header that is not valid fails
 * the record.
 */
export class HeaderResolver {
  private readonly templates: [string, string][];
  private readonly logger: LoggerService;

  constructor(
    headers: Record<string, string>,
    private readonly metadataFilter: MetadataFilter | undefined,
    private readonly interpolator: Interpolator,
    logger?: LoggerService
  ) {
    this.templates = Object.entries(headers);
    this.logger = logger || new Logger(HeaderResolver.name);
  }

  resolve(record: PipelineRecord, target: MsgHdrs): MsgHdrs {
    for (const [name, template] of this.templates) {
      try {
        target.append(name, this.interpolator.evaluate(template, record));
      } catch (err) {
        throw new TemplateEvaluationError(`header ${name} interpolation error: ${errorMessage(err)}`, { cause: err });
      }
    }

    this.metadataFilter?.walk(record, (key, value) => {
      try {
        target.append(key, value);
      } catch (err) {
        this.logger.warn(`Skipping metadata "${key}" as a header: ${errorMessage(err)}`);
      }
    });

    return target;
  }
}
