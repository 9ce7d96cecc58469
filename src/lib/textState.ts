// =============================================================================
// Dialog State — Styled Text
// =============================================================================
// TextState is an immutable list of styled runs. It is the value type used for
// dialog titles, messages and button labels, so it compares and hashes by
// content rather than by reference.
//
// Run boundaries are part of the value: "a" + "b" is not equal to "ab".
// =============================================================================

import type { FontWeight } from '@shared/types/enums';
import { isEqual, type Equatable, type Hashable, type Hasher } from './equality';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TextStyle {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  strikethrough?: boolean;
  monospaced?: boolean;
  fontWeight?: FontWeight;
  /** Any CSS color value. */
  foregroundColor?: string;
  /** Extra spacing between characters, in px. */
  kerning?: number;
}

export interface TextRun {
  readonly text: string;
  readonly style: Readonly<TextStyle>;
}

export type TextLike = string | TextState;

/**
 * Drops unset keys and `false` flags so `{ bold: false }` equals `{}`.
 * Non-finite kerning is dropped too; it has no rendering and no JSON form.
 */
function normalizeStyle(style: TextStyle): TextStyle {
  const out: TextStyle = {};
  if (style.bold) out.bold = true;
  if (style.italic) out.italic = true;
  if (style.underline) out.underline = true;
  if (style.strikethrough) out.strikethrough = true;
  if (style.monospaced) out.monospaced = true;
  if (style.fontWeight !== undefined) out.fontWeight = style.fontWeight;
  if (style.foregroundColor !== undefined) out.foregroundColor = style.foregroundColor;
  if (style.kerning !== undefined && Number.isFinite(style.kerning)) out.kerning = style.kerning;
  return out;
}

function styleFlags(style: TextStyle): string[] {
  const flags: string[] = [];
  if (style.bold) flags.push('bold');
  if (style.italic) flags.push('italic');
  if (style.underline) flags.push('underline');
  if (style.strikethrough) flags.push('strikethrough');
  if (style.monospaced) flags.push('monospaced');
  if (style.fontWeight !== undefined) flags.push(`fontWeight: ${style.fontWeight}`);
  if (style.foregroundColor !== undefined) flags.push(`foregroundColor: ${style.foregroundColor}`);
  if (style.kerning !== undefined) flags.push(`kerning: ${style.kerning}`);
  return flags;
}

// ---------------------------------------------------------------------------
// TextState
// ---------------------------------------------------------------------------

export class TextState implements Equatable, Hashable {
  readonly runs: readonly TextRun[];

  constructor(content: string | readonly TextRun[] = '') {
    this.runs =
      typeof content === 'string'
        ? [{ text: content, style: {} }]
        : content.map((run) => ({ text: run.text, style: normalizeStyle(run.style) }));
  }

  static of(content: string): TextState {
    return new TextState(content);
  }

  /** Lifts a plain string; passes a TextState through untouched. */
  static from(value: TextLike): TextState {
    return typeof value === 'string' ? new TextState(value) : value;
  }

  get plainText(): string {
    return this.runs.map((run) => run.text).join('');
  }

  /** True when no run carries any style. */
  get isPlain(): boolean {
    return this.runs.every((run) => Object.keys(run.style).length === 0);
  }

  concat(other: TextLike): TextState {
    return new TextState([...this.runs, ...TextState.from(other).runs]);
  }

  // --- Modifiers (apply to every run; later calls win) ---

  bold(): TextState {
    return this.styled({ bold: true });
  }

  italic(): TextState {
    return this.styled({ italic: true });
  }

  underline(): TextState {
    return this.styled({ underline: true });
  }

  strikethrough(): TextState {
    return this.styled({ strikethrough: true });
  }

  monospaced(): TextState {
    return this.styled({ monospaced: true });
  }

  fontWeight(weight: FontWeight): TextState {
    return this.styled({ fontWeight: weight });
  }

  foregroundColor(color: string): TextState {
    return this.styled({ foregroundColor: color });
  }

  kerning(kerning: number): TextState {
    return this.styled({ kerning });
  }

  // --- Value semantics ---

  equals(other: unknown): boolean {
    if (!(other instanceof TextState)) return false;
    if (this.runs.length !== other.runs.length) return false;
    return this.runs.every((run, i) => {
      const theirs = other.runs[i];
      return theirs !== undefined && run.text === theirs.text && isEqual(run.style, theirs.style);
    });
  }

  hash(hasher: Hasher): void {
    hasher.combineString('TextState').combineString(String(this.runs.length));
    for (const run of this.runs) {
      hasher.combineString(run.text).combine(run.style);
    }
  }

  describe(): string {
    return this.runs
      .map((run) => {
        const flags = styleFlags(run.style);
        const text = JSON.stringify(run.text);
        return flags.length > 0 ? `${text} [${flags.join(', ')}]` : text;
      })
      .join(' + ');
  }

  toString(): string {
    return this.plainText;
  }

  private styled(patch: TextStyle): TextState {
    return new TextState(this.runs.map((run) => ({ text: run.text, style: { ...run.style, ...patch } })));
  }
}
