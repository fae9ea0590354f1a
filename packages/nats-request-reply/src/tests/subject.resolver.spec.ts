import { createMock } from '@golevelup/ts-jest';

import { ExpressionInterpolator, Interpolator } from '../lib/interpolation';
import { PipelineRecord } from '../lib/pipeline.record';
import { TemplateEvaluationError } from '../lib/request-reply.errors';
import { SubjectResolver } from '../lib/subject.resolver';

describe('SubjectResolver', () => {
  const interpolator = new ExpressionInterpolator();

  it('should resolve a static subject', () => {
    const resolver = new SubjectResolver('orders.created', interpolator);

    expect(resolver.resolve(PipelineRecord.fromString('x'))).toBe('orders.created');
  });

  it('should resolve a templated subject per record', () => {
    const resolver = new SubjectResolver('orders.${! json("id") }', interpolator);

    expect(resolver.resolve(PipelineRecord.fromJSON({ id: '42' }))).toBe('orders.42');
    expect(resolver.resolve(PipelineRecord.fromJSON({ id: '43' }))).toBe('orders.43');
  });

  it('should pass template errors through', () => {
    const resolver = new SubjectResolver('orders.${! meta("region") }', interpolator);

    expect(() => resolver.resolve(PipelineRecord.fromString('x'))).toThrow(
      'failed to evaluate "meta("region")": metadata value "region" not found'
    );
  });

  it('should reject an empty subject', () => {
    const record = PipelineRecord.fromString('x');
    record.setMeta('subject', '');
    const resolver = new SubjectResolver('${! meta("subject") }', interpolator);

    expect(() => resolver.resolve(record)).toThrow(TemplateEvaluationError);
    expect(() => resolver.resolve(record)).toThrow('subject template "${! meta("subject") }" resolved to an empty subject');
  });

  it('should wrap unexpected interpolator failures', () => {
    const failing = createMock<Interpolator>({
      evaluate: jest.fn().mockImplementation(() => {
        throw new Error('boom');
      })
    });
    const resolver = new SubjectResolver('orders', failing);

    expect(() => resolver.resolve(PipelineRecord.fromString('x'))).toThrow(
      new TemplateEvaluationError('subject interpolation error: boom')
    );
  });
});
