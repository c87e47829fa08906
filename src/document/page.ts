import { ContentStreamBuilder } from "#src/content/content-stream";

/**
 * One page of the output document.
 *
 * Owns an append-only content stream; `number` is 1-based.
 */
export class Page {
  readonly content = new ContentStreamBuilder();

  constructor(readonly number: number) {}

  get lines(): readonly string[] {
    return this.content.operators;
  }
}
