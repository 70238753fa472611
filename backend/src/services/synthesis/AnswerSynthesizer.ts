import { PromptTemplate } from '@langchain/core/prompts';
import type { RetryConfig, SynthesisConfig } from '../../config/environment';
import { CompletionCapabilityError, errorMessage } from '../../errors/PipelineErrors';
import type { CompletionCapability } from '../../types/LLM';
import type { AnsweredResult, AnswerLink, RetrievedCandidate } from '../../types/Pipeline';
import { withRetry } from '../llm/retry';

export const INSUFFICIENT_GROUNDING_ANSWER =
  "I couldn't find any relevant course material or forum discussion for this question, " +
  "so I can't give a grounded answer. Try rephrasing it, or ask on the course forum.";

const CITATION_PATTERN = /\^?\[(\d+(?:\s*,\s*\d+)*)\]/g;
const CODE_PATTERN = /```[\s\S]*?```|`[^`\n]*`/g;
const URL_PATTERN = /https?:\/\/[^\s)\]>"'`]+/g;
const SOURCES_SECTION_PATTERNS = [
  /\n\s*(?:#{1,6}\s*)?\**(?:sources|references)\**\s*:[\s\S]*$/i,
  /\n\s*#{1,6}\s*(?:sources|references)\s*\n[\s\S]*$/i
];

export interface SynthesizerOptions extends SynthesisConfig {
  retry: RetryConfig;
}

export interface ParsedCompletion {
  answerText: string;
  /** zero-based candidate indices in order of first citation */
  cited: number[];
  dropped: string[];
}

export function makeExcerpt(text: string, maxLength: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.length > maxLength ? `${collapsed.slice(0, maxLength).trimEnd()}...` : collapsed;
}

/** Blanks out fenced and inline code, keeping every other character where it was. */
function maskCode(text: string): string {
  return text.replace(CODE_PATTERN, code => ' '.repeat(code.length));
}

function citedNumbers(marker: string): number[] {
  return marker.split(',').map(value => Number(value.trim()));
}

interface CitationRun {
  start: number;
  end: number;
  numbers: number[];
}

/**
 * Rewrites the citation markers outside code. Adjacent markers such as `[1][2]`
 * form one run and each number is written once per run; a run left without
 * numbers is removed together with the spaces before it.
 */
function rewriteCitations(text: string, renumber: (number: number) => number | undefined): string {
  const runs: CitationRun[] = [];

  for (const match of maskCode(text).matchAll(CITATION_PATTERN)) {
    const start = match.index ?? 0;
    const previous = runs.length > 0 ? runs[runs.length - 1] : undefined;
    const run: CitationRun = previous && previous.end === start ? previous : { start, end: start, numbers: [] };
    if (run !== previous) {
      runs.push(run);
    }
    run.end = start + match[0].length;

    for (const number of citedNumbers(match[1])) {
      const mapped = renumber(number);
      if (mapped !== undefined && !run.numbers.includes(mapped)) {
        run.numbers.push(mapped);
      }
    }
  }

  let rewritten = '';
  let last = 0;
  for (const { start, end, numbers } of runs) {
    rewritten += text.slice(last, start);
    rewritten = numbers.length > 0
      ? rewritten + numbers.map(number => `[${number}]`).join('')
      : rewritten.replace(/[ \t]+$/, '');
    last = end;
  }

  return rewritten + text.slice(last);
}

/**
 * Pulls citations out of a completion. `[n]`, `^[n]` and `[n, m]` refer to the
 * numbered excerpts; bare URLs count when they belong to a candidate. Anything
 * else is reported in `dropped`. Code spans are never read as citations.
 */
export function parseCompletion(output: string, candidates: readonly RetrievedCandidate[]): ParsedCompletion {
  const occurrences: Array<{ position: number; index: number }> = [];
  const dropped: string[] = [];

  const masked = maskCode(output);

  for (const match of masked.matchAll(CITATION_PATTERN)) {
    for (const number of citedNumbers(match[1])) {
      if (number >= 1 && number <= candidates.length) {
        occurrences.push({ position: match.index ?? 0, index: number - 1 });
      } else {
        dropped.push(`[${number}]`);
      }
    }
  }

  for (const match of masked.matchAll(URL_PATTERN)) {
    const url = match[0].replace(/[.,;:!?]+$/, '');
    const index = candidates.findIndex(candidate => candidate.sourceUrl === url);
    if (index === -1) {
      dropped.push(url);
    } else {
      occurrences.push({ position: match.index ?? 0, index });
    }
  }

  const cited: number[] = [];
  for (const { index } of occurrences.sort((a, b) => a.position - b.position)) {
    if (!cited.includes(index)) {
      cited.push(index);
    }
  }

  let answerText = output.trim();
  for (const pattern of SOURCES_SECTION_PATTERNS) {
    const stripped = answerText.replace(pattern, '').trim();
    if (stripped) {
      answerText = stripped;
    }
  }

  return { answerText, cited, dropped };
}

export class AnswerSynthesizer {
  private promptTemplate: PromptTemplate;

  constructor(
    private readonly completion: CompletionCapability,
    private readonly options: SynthesizerOptions
  ) {
    this.promptTemplate = this.createPromptTemplate();
  }

  async synthesize(
    question: string,
    candidates: readonly RetrievedCandidate[],
    signal?: AbortSignal
  ): Promise<AnsweredResult> {
    if (candidates.length === 0) {
      return {
        answerText: INSUFFICIENT_GROUNDING_ANSWER,
        links: [],
        grounded: false,
        warnings: []
      };
    }

    const prompt = await this.buildPrompt(question, candidates);
    const output = await withRetry(
      async attemptSignal => {
        const text = await this.completion.complete(prompt, { signal: attemptSignal });
        if (!text || !text.trim()) {
          throw new Error('completion was empty');
        }
        return text;
      },
      { ...this.options.retry, signal, operation: 'Answer completion' },
      (lastError, attempts) =>
        new CompletionCapabilityError(`Answer completion failed: ${errorMessage(lastError)}`, attempts, lastError)
    );

    const parsed = parseCompletion(output, candidates);
    if (parsed.dropped.length > 0) {
      console.warn(`Dropped ${parsed.dropped.length} citation(s) not among retrieved sources: ${parsed.dropped.join(', ')}`);
    }
    if (parsed.cited.length === 0) {
      console.warn('Completion cited none of the supplied excerpts');
    }

    const links = this.buildLinks(parsed.cited, candidates);
    return {
      answerText: this.renumberCitations(parsed.answerText, candidates, links),
      links,
      grounded: true,
      warnings: []
    };
  }

  buildPrompt(question: string, candidates: readonly RetrievedCandidate[]): Promise<string> {
    return this.promptTemplate.format({
      excerpts: this.buildExcerpts(candidates),
      question: question.trim()
    });
  }

  /** Points each `[n]` at the position of its source in `links`. */
  private renumberCitations(
    answerText: string,
    candidates: readonly RetrievedCandidate[],
    links: readonly AnswerLink[]
  ): string {
    return rewriteCitations(answerText, number => {
      const candidate = candidates[number - 1];
      const position = candidate ? links.findIndex(link => link.url === candidate.sourceUrl) : -1;
      return position === -1 ? undefined : position + 1;
    });
  }

  private buildLinks(cited: readonly number[], candidates: readonly RetrievedCandidate[]): AnswerLink[] {
    const links: AnswerLink[] = [];
    for (const index of cited) {
      const candidate = candidates[index];
      if (links.some(link => link.url === candidate.sourceUrl)) {
        continue;
      }
      links.push({
        url: candidate.sourceUrl,
        excerpt: makeExcerpt(candidate.chunk.text, this.options.excerptLength)
      });
      if (links.length >= this.options.maxLinks) {
        break;
      }
    }
    return links;
  }

  private buildExcerpts(candidates: readonly RetrievedCandidate[]): string {
    return candidates
      .map((candidate, index) => {
        const origin = candidate.chunk.corpus === 'course' ? 'course material' : 'forum post';
        const title = candidate.title ? ` "${candidate.title}"` : '';
        return `[${index + 1}] Source: ${candidate.sourceUrl} (${origin}${title})\n${candidate.chunk.text.trim()}`;
      })
      .join('\n\n');
  }

  private createPromptTemplate(): PromptTemplate {
    return PromptTemplate.fromTemplate(`You are a teaching assistant for a university course. Answer the student's question using ONLY the numbered excerpts below, taken from the course material and the course discussion forum.

## Guidelines
- Use only information found in the excerpts; NEVER make up facts, commands or links
- Cite each excerpt you rely on by its number in square brackets, such as [1] or [2][3]
- Prefer course material over forum posts when they disagree
- If the excerpts do not answer the question, say so clearly instead of guessing
- Be concise and answer in the language of the question

## Excerpts
{excerpts}

## Student Question
{question}

Your answer:`);
  }
}
