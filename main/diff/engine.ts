import type { DiffResult, Granularity } from '../../shared/types';
import { preview } from '../../shared/records';
import { ResourceLimitExceeded } from '../errors';
import { Logger } from '../logger';
import { align, toSegments } from './alignment';
import { renderHtml } from './render';
import { similarityFromAlignment } from './similarity';
import { summarize } from './summary';
import { codePointLength } from './tokenize';

const logger = new Logger('diff');

export interface DiffEngineOptions {
  /** Longest input accepted on either side, in code points. */
  maxInputLength: number;
}

export class DiffEngine {
  private readonly maxInputLength: number;

  constructor(options: DiffEngineOptions) {
    this.maxInputLength = options.maxInputLength;
  }

  compare(textA: string, textB: string, granularity: Granularity = 'char'): DiffResult {
    this.checkLength('a', textA);
    this.checkLength('b', textB);

    const startTime = Date.now();
    const alignment = align(textA, textB, granularity);
    const segments = toSegments(alignment);

    logger.debug('Compared texts', {
      granularity,
      unitsA: alignment.unitsA.length,
      unitsB: alignment.unitsB.length,
      segments: segments.length,
      duration: Date.now() - startTime,
    });

    return {
      previewA: preview(textA),
      previewB: preview(textB),
      granularity,
      segments,
      similarity: similarityFromAlignment(alignment),
      html: renderHtml(segments),
      summary: summarize(segments),
    };
  }

  private checkLength(side: 'a' | 'b', text: string): void {
    // UTF-16 length is an upper bound on the code point count.
    if (text.length <= this.maxInputLength) return;

    const length = codePointLength(text);
    if (length > this.maxInputLength) {
      logger.warn('Comparison input over limit', { side, length, limit: this.maxInputLength });
      throw new ResourceLimitExceeded(
        `Text ${side.toUpperCase()} is ${length} characters; the limit is ${this.maxInputLength}`,
        { side, length, limit: this.maxInputLength }
      );
    }
  }
}
