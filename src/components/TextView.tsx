import type { CSSProperties } from 'react';
import { FONT_WEIGHT_VALUES } from '@shared/types/enums';
import type { TextState, TextStyle } from '@/lib/textState';

export function textStyleToCss(style: Readonly<TextStyle>): CSSProperties {
  const css: CSSProperties = {};
  if (style.fontWeight !== undefined) css.fontWeight = FONT_WEIGHT_VALUES[style.fontWeight];
  else if (style.bold) css.fontWeight = FONT_WEIGHT_VALUES.bold;
  if (style.italic) css.fontStyle = 'italic';

  const decorations = [style.underline && 'underline', style.strikethrough && 'line-through'].filter(Boolean);
  if (decorations.length > 0) css.textDecorationLine = decorations.join(' ');

  if (style.monospaced) css.fontFamily = 'ui-monospace, SFMono-Regular, Menlo, monospace';
  if (style.foregroundColor !== undefined) css.color = style.foregroundColor;
  if (style.kerning !== undefined) css.letterSpacing = `${style.kerning}px`;
  return css;
}

/** Renders styled text: a bare string when unstyled, otherwise one span per run. */
export function TextView({ text }: { text: TextState }) {
  const [only] = text.runs;
  if (text.runs.length === 1 && only !== undefined && text.isPlain) {
    return <>{only.text}</>;
  }
  return (
    <>
      {text.runs.map((run, i) => (
        <span key={i} style={textStyleToCss(run.style)}>
          {run.text}
        </span>
      ))}
    </>
  );
}
