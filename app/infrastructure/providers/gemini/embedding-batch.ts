/**
 * Ordered group of text items submitted to one embedding model in one call.
 */
export class EmbeddingBatch {
  private readonly contents: string[] = [];

  constructor(public readonly model: string) {}

  addText(text: string): this {
    this.contents.push(text);
    return this;
  }

  get texts(): readonly string[] {
    return this.contents;
  }

  get size(): number {
    return this.contents.length;
  }
}
