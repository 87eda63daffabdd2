/**
 * Structured suggest query, encoded into a PayloadCarrier payload.
 */

import type { DocumentObject } from '@shardstats/wire';

/** Anything that renders itself as a document */
export interface DocumentWritable {
  toDocument(): DocumentObject;
}

export type SuggestionType = 'term' | 'phrase' | 'completion';

export interface SuggestionOptions {
  /** Field to draw suggestions from */
  field: string;
  /** Text for this suggestion only, overriding the global text */
  text?: string;
  /** Maximum suggestions per entry */
  size?: number;
  analyzer?: string;
}

interface Suggestion {
  name: string;
  type: SuggestionType;
  options: SuggestionOptions;
}

const GLOBAL_TEXT_FIELD = 'text';

/**
 * @example
 * ```typescript
 * const query = new SuggestQueryBuilder()
 *   .text('shard stat')
 *   .term('spelling', { field: 'title', size: 3 });
 *
 * carrier.setPayloadFromStructuredQuery(query);
 * ```
 */
export class SuggestQueryBuilder implements DocumentWritable {
  private globalText?: string;
  private readonly suggestions = new Map<string, Suggestion>();

  /** Text shared by every suggestion that sets none of its own */
  text(text: string): this {
    this.globalText = text;
    return this;
  }

  term(name: string, options: SuggestionOptions): this {
    return this.add(name, 'term', options);
  }

  phrase(name: string, options: SuggestionOptions): this {
    return this.add(name, 'phrase', options);
  }

  completion(name: string, options: SuggestionOptions): this {
    return this.add(name, 'completion', options);
  }

  get size(): number {
    return this.suggestions.size;
  }

  /**
   * `{ text?, <name>: { text?, <type>: { field, size?, analyzer? } } }`
   */
  toDocument(): DocumentObject {
    const document: DocumentObject = {};
    if (this.globalText !== undefined) {
      document[GLOBAL_TEXT_FIELD] = this.globalText;
    }

    for (const { name, type, options } of this.suggestions.values()) {
      const body: DocumentObject = { field: options.field };
      if (options.size !== undefined) body['size'] = options.size;
      if (options.analyzer !== undefined) body['analyzer'] = options.analyzer;

      const entry: DocumentObject = {};
      if (options.text !== undefined) entry['text'] = options.text;
      entry[type] = body;
      document[name] = entry;
    }
    return document;
  }

  private add(name: string, type: SuggestionType, options: SuggestionOptions): this {
    if (name === GLOBAL_TEXT_FIELD) {
      throw new Error(`Suggestion name "${GLOBAL_TEXT_FIELD}" is reserved for the global text`);
    }
    // Re-adding a name replaces the earlier suggestion
    this.suggestions.set(name, { name, type, options: { ...options } });
    return this;
  }
}
