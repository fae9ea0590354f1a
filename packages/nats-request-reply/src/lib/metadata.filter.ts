import { PipelineRecord } from './pipeline.record';
import { ConfigurationError, errorMessage } from './request-reply.errors';

export interface MetadataFilterOptions {
  /**
   * Keys starting with any of these prefixes are selected
   */
  includePrefixes?: string[];

  /**
   * Keys matching any of these regular expressions are selected
   */
  includePatterns?: string[];
}

/**
 * Selects which record metadata entries are forwarded. A filter with no
 * prefixes and no patterns selects nothing.
 */
export class MetadataFilter {
  private readonly prefixes: string[];
  private readonly patterns: RegExp[];

  constructor(options: MetadataFilterOptions = {}) {
    this.prefixes = options.includePrefixes ?? [];
    this.patterns = (options.includePatterns ?? []).map((pattern) => {
      try {
        return new RegExp(pattern);
      } catch (err) {
        throw new ConfigurationError(`invalid metadata include pattern "${pattern}": ${errorMessage(err)}`, { cause: err });
      }
    });
  }

  matches(key: string): boolean {
    return this.prefixes.some((prefix) => key.startsWith(prefix)) || this.patterns.some((pattern) => pattern.test(key));
  }

  walk(record: PipelineRecord, fn: (key: string, value: string) => void): void {
    record.walkMeta((key, value) => {
      if (this.matches(key)) {
        fn(key, value);
      }
    });
  }
}
