const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * The unit of data flowing through a pipeline: a raw body plus string metadata.
 * Metadata keeps insertion order.
 */
export class PipelineRecord {
  private readonly metadata: Map<string, string>;

  constructor(private readonly body: Uint8Array, metadata?: Iterable<[string, string]>) {
    this.metadata = new Map(metadata);
  }

  static fromBytes(bytes: Uint8Array): PipelineRecord {
    return new PipelineRecord(bytes);
  }

  static fromString(value: string): PipelineRecord {
    return new PipelineRecord(encoder.encode(value));
  }

  static fromJSON(value: unknown): PipelineRecord {
    return PipelineRecord.fromString(JSON.stringify(value));
  }

  asBytes(): Uint8Array {
    return this.body;
  }

  asString(): string {
    return decoder.decode(this.body);
  }

  /**
   * Parses the body as JSON.
   * @throws SyntaxError if the body is not valid JSON
   */
  asStructured(): unknown {
    const parsed: unknown = JSON.parse(this.asString());
    return parsed;
  }

  getMeta(key: string): string | undefined {
    return this.metadata.get(key);
  }

  setMeta(key: string, value: string): void {
    this.metadata.set(key, value);
  }

  walkMeta(fn: (key: string, value: string) => void): void {
    for (const [key, value] of this.metadata) {
      fn(key, value);
    }
  }

  metadataEntries(): [string, string][] {
    return Array.from(this.metadata.entries());
  }
}
