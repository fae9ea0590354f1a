import { Interpolator } from './interpolation';
import { PipelineRecord } from './pipeline.record';
import { errorMessage, TemplateEvaluationError } from './request-reply.errors';

/**
 * Resolves the subject a record is published on.
 */
export class SubjectResolver {
  constructor(
    private readonly template: string,
    private readonly interpolator: Interpolator
  ) {}

  resolve(record: PipelineRecord): string {
    let subject: string;
    try {
      subject = this.interpolator.evaluate(this.template, record);
    } catch (err) {
      if (err instanceof TemplateEvaluationError) {
        throw err;
      }
      throw new TemplateEvaluationError(`subject interpolation error: ${errorMessage(err)}`, { cause: err });
    }

    if (subject.length === 0) {
      throw new TemplateEvaluationError(`subject template "${this.template}" resolved to an empty subject`);
    }
    return subject;
  }
}
