import { MarkupBuildError } from '../errors';
import type { StyleDecision, StyleName } from '../types';
import { DEFAULT_LEXICON, type Lexicon } from './emotionClassifier';

export interface StyleProsody {
  /** Voice style name used in the express-as wrapper. */
  expressAs: string;
  rate: string;
  pitch: string;
  /** Multiplier for engines that only understand a speaking rate. */
  speakingRate: number;
}

export const STYLE_PROSODY: Record<StyleName, StyleProsody> = {
  neutral: { expressAs: 'general', rate: '0%', pitch: '0%', speakingRate: 1.0 },
  cheerful: { expressAs: 'cheerful', rate: '+10%', pitch: '+5%', speakingRate: 1.1 },
  empathetic: { expressAs: 'empathetic', rate: '-10%', pitch: '-2%', speakingRate: 0.9 },
  patient: { expressAs: 'gentle', rate: '-15%', pitch: '0%', speakingRate: 0.85 },
  de_escalate: { expressAs: 'calm', rate: '-20%', pitch: '-5%', speakingRate: 0.8 },
};

export interface MarkupBuilderOptions {
  voice: string;
  language?: string;
  maxEmphasis?: number;
  lexicon?: Lexicon;
}

export interface BuildOptions {
  /** Extra words to stress, e.g. the ones the language model asked for. */
  emphasisWords?: readonly string[];
  voice?: string;
}

export interface MarkupRenderer {
  build(text: string, decision: StyleDecision, options?: BuildOptions): string;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

// Characters XML 1.0 does not allow at all.
const ILLEGAL_XML_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;

export function escapeXml(value: string): string {
  return value.replace(ILLEGAL_XML_CHARS, '').replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

const TAG = /<(\/?)([A-Za-z][\w:.-]*)((?:\s+[\w:.-]+="[^"<>]*")*)\s*(\/?)>/y;
const ENTITY = /&(?:amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);/y;

/**
 * Throws MarkupBuildError unless every tag is balanced and every `&`
 * starts an entity.
 */
export function assertWellFormed(markup: string): void {
  const stack: string[] = [];
  let i = 0;

  while (i < markup.length) {
    const ch = markup[i];
    if (ch === '<') {
      TAG.lastIndex = i;
      const match = TAG.exec(markup);
      if (!match) throw new MarkupBuildError(`unparseable tag at offset ${i}`);
      const [whole, closing, name, , selfClosing] = match;
      if (closing) {
        const open = stack.pop();
        if (open !== name) {
          throw new MarkupBuildError(`</${name}> closes ${open ? `<${open}>` : 'nothing'}`);
        }
      } else if (!selfClosing) {
        stack.push(name);
      }
      i += whole.length;
    } else if (ch === '&') {
      ENTITY.lastIndex = i;
      const match = ENTITY.exec(markup);
      if (!match) throw new MarkupBuildError(`bare '&' at offset ${i}`);
      i += match[0].length;
    } else if (ch === '>') {
      throw new MarkupBuildError(`bare '>' at offset ${i}`);
    } else {
      i++;
    }
  }

  if (stack.length > 0) {
    throw new MarkupBuildError(`unclosed <${stack[stack.length - 1]}>`);
  }
}

export function markupToPlainText(markup: string): string {
  return markup
    .replace(/<[^>]*>/g, '')
    .replace(/&(amp|lt|gt|quot|apos);/g, (_, name: string) => {
      const decoded: Record<string, string> = { amp: '&', lt: '<', gt: '>', quot: '"', apos: "'" };
      return decoded[name] ?? '';
    })
    .replace(/\s+/g, ' ')
    .trim();
}

const WORD_PARTS = /^([^\p{L}\p{N}]*)(.*?)([^\p{L}\p{N}]*)$/su;

/**
 * Renders a response as SSML: speak > voice > express-as (style + degree)
 * > prosody, with a few important words wrapped in emphasis.
 */
export class MarkupBuilder implements MarkupRenderer {
  private readonly voice: string;
  private readonly language: string;
  private readonly maxEmphasis: number;
  private readonly important: ReadonlySet<string>;

  constructor(options: MarkupBuilderOptions) {
    const lexicon = options.lexicon ?? DEFAULT_LEXICON;
    this.voice = options.voice;
    this.language = options.language ?? 'en-US';
    this.maxEmphasis = options.maxEmphasis ?? 3;
    this.important = new Set([...lexicon.negations, ...lexicon.superlatives, ...lexicon.emphasisKeywords]);
  }

  build(text: string, decision: StyleDecision, options: BuildOptions = {}): string {
    const prosody = STYLE_PROSODY[decision.style];
    const degree = Math.min(2, Math.max(0.01, decision.degree)).toFixed(2);
    const voice = escapeXml(options.voice ?? this.voice);
    const body = this.renderBody(text.trim(), options.emphasisWords ?? []);

    const markup =
      `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" ` +
      `xmlns:mstts="https://www.w3.org/2001/mstts" xml:lang="${escapeXml(this.language)}">` +
      `<voice name="${voice}">` +
      `<mstts:express-as style="${prosody.expressAs}" styledegree="${degree}">` +
      `<prosody rate="${prosody.rate}" pitch="${prosody.pitch}">${body}</prosody>` +
      `</mstts:express-as></voice></speak>`;

    assertWellFormed(markup);
    return markup;
  }

  isImportant(word: string, extra: ReadonlySet<string> = new Set()): boolean {
    const lower = word.toLowerCase().replace(/’/g, "'");
    return /\d/.test(word) || this.important.has(lower) || extra.has(lower);
  }

  private renderBody(text: string, emphasisWords: readonly string[]): string {
    const extra = new Set(
      emphasisWords.flatMap((phrase) => phrase.toLowerCase().split(/\s+/)).filter((w) => w !== '')
    );
    let emphasized = 0;

    return text
      .split(/(\s+)/)
      .map((chunk) => {
        if (chunk === '' || /^\s+$/.test(chunk)) return chunk;
        const parts = WORD_PARTS.exec(chunk);
        if (!parts) return escapeXml(chunk);
        const [, lead, core, trail] = parts;
        if (core !== '' && emphasized < this.maxEmphasis && this.isImportant(core, extra)) {
          emphasized++;
          return `${escapeXml(lead)}<emphasis level="moderate">${escapeXml(core)}</emphasis>${escapeXml(trail)}`;
        }
        return escapeXml(chunk);
      })
      .join('');
  }
}
