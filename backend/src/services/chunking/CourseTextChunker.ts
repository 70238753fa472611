import { ConfigurationError } from '../../errors/PipelineErrors';
import type { ChunkingConfig } from '../../types/LLM';
import type { Chunk, Document } from '../../types/Pipeline';

interface WordSpan {
  start: number;
  end: number;
}

/** Half-open range of word indices. */
type WordRange = [number, number];

const SENTENCE_END = /[.!?]["')\]]?$/;

/** Token estimate used throughout: 1.3 tokens per whitespace-separated word. */
export function estimateTokens(wordCount: number): number {
  return Math.ceil((wordCount * 13) / 10);
}

/** Largest word count whose estimate stays within `tokens`. */
export function wordsForTokens(tokens: number): number {
  return Math.floor((tokens * 10) / 13);
}

export function countTokens(text: string): number {
  const words = text.trim().split(/\s+/).filter(w => w.length > 0);
  return estimateTokens(words.length);
}

/**
 * Rebuilds the source text from a document's chunks by dropping, from each chunk,
 * the prefix it shares with its predecessor.
 */
export function reconstructText(chunks: readonly Chunk[]): string {
  const ordered = [...chunks].sort((a, b) => a.startOffset - b.startOffset);
  if (ordered.length === 0) {
    return '';
  }

  let text = ordered[0].text;
  let covered = ordered[0].endOffset;
  for (const chunk of ordered.slice(1)) {
    text += chunk.text.slice(Math.max(0, covered - chunk.startOffset));
    covered = chunk.endOffset;
  }
  return text;
}

export class CourseTextChunker {
  private config: ChunkingConfig;

  constructor(config?: Partial<ChunkingConfig>) {
    this.config = {
      maxTokens: 300,
      overlapTokens: 50,
      ...config
    };
    this.validate(this.config.maxTokens, this.config.overlapTokens);
  }

  /**
   * Splits a document into chunks of at most `maxTokens`, preferring paragraph and
   * heading boundaries. Every chunk after the first starts with up to
   * `overlapTokens` of its predecessor's text.
   */
  chunkDocument(
    document: Document,
    maxTokens: number = this.config.maxTokens,
    overlapTokens: number = this.config.overlapTokens
  ): Chunk[] {
    this.validate(maxTokens, overlapTokens);

    const text = document.rawText;
    const words = this.findWords(text);
    if (words.length === 0) {
      return [];
    }

    if (estimateTokens(words.length) <= maxTokens) {
      return [this.buildChunk(document, 0, 0, text.length)];
    }

    const coreWords = wordsForTokens(maxTokens - overlapTokens);
    const overlapWords = wordsForTokens(overlapTokens);
    const cores = this.packBlocks(this.findBlocks(text, words), words, text, coreWords);

    return cores.map(([coreStart], index) => {
      const startWord = index === 0 ? 0 : Math.max(cores[index - 1][0], coreStart - overlapWords);
      const startOffset = index === 0 ? 0 : words[startWord].start;
      const endOffset = index === cores.length - 1 ? text.length : words[cores[index + 1][0]].start;
      return this.buildChunk(document, index, startOffset, endOffset);
    });
  }

  private validate(maxTokens: number, overlapTokens: number): void {
    if (!Number.isInteger(maxTokens) || !Number.isInteger(overlapTokens) || overlapTokens < 0) {
      throw new ConfigurationError('Chunk sizes must be non-negative integers');
    }
    if (overlapTokens >= maxTokens) {
      throw new ConfigurationError(`overlapTokens (${overlapTokens}) must be smaller than maxTokens (${maxTokens})`);
    }
    if (wordsForTokens(maxTokens - overlapTokens) < 1) {
      throw new ConfigurationError(`maxTokens (${maxTokens}) leaves no room for text after the overlap`);
    }
  }

  private buildChunk(document: Document, index: number, startOffset: number, endOffset: number): Chunk {
    return {
      id: `${document.id}:${index}`,
      documentId: document.id,
      text: document.rawText.slice(startOffset, endOffset),
      startOffset,
      endOffset,
      corpus: document.corpus
    };
  }

  private findWords(text: string): WordSpan[] {
    const words: WordSpan[] = [];
    for (const match of text.matchAll(/\S+/g)) {
      const start = match.index ?? 0;
      words.push({ start, end: start + match[0].length });
    }
    return words;
  }

  /** Paragraphs (blank-line separated) and markdown headings start new blocks. */
  private findBlocks(text: string, words: WordSpan[]): WordRange[] {
    const blocks: WordRange[] = [];
    let blockStart = 0;

    for (let i = 1; i < words.length; i++) {
      const gap = text.slice(words[i - 1].end, words[i].start);
      const isParagraphBreak = /\n[ \t]*\n/.test(gap);
      const isHeading = gap.includes('\n') && text[words[i].start] === '#';

      if (isParagraphBreak || isHeading) {
        blocks.push([blockStart, i]);
        blockStart = i;
      }
    }
    blocks.push([blockStart, words.length]);

    return blocks;
  }

  private packBlocks(blocks: WordRange[], words: WordSpan[], text: string, coreWords: number): WordRange[] {
    const cores: WordRange[] = [];
    let current: WordRange | null = null;

    for (const [blockStart, blockEnd] of blocks) {
      let start = blockStart;

      while (start < blockEnd) {
        const size = blockEnd - start;

        if (current === null) {
          if (size <= coreWords) {
            current = [start, blockEnd];
            start = blockEnd;
          } else {
            const cut = this.findCut(words, text, start, start + coreWords);
            cores.push([start, cut]);
            start = cut;
          }
        } else if (current[1] - current[0] + size <= coreWords) {
          current = [current[0], blockEnd];
          start = blockEnd;
        } else {
          cores.push(current);
          current = null;
        }
      }
    }

    if (current !== null) {
      cores.push(current);
    }
    return cores;
  }

  /** Cut after the last sentence end in the window when it falls past 70% of it. */
  private findCut(words: WordSpan[], text: string, start: number, limit: number): number {
    const earliest = start + Math.ceil((limit - start) * 0.7);

    for (let i = limit - 1; i >= earliest && i > start; i--) {
      if (SENTENCE_END.test(text.slice(words[i].start, words[i].end))) {
        return i + 1;
      }
    }
    return limit;
  }
}
