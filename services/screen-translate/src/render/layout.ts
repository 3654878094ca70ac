import type { ImageSize, OverlayStyle, PixelRect } from '@screenlingo/shared';

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export interface LabelLayout {
  x: number;
  y: number;
  width: number;
  height: number;
  fontSize: number;
  lineHeight: number;
  lines: string[];
}

export const MIN_FONT_SIZE = 10;
export const MAX_FONT_SIZE = 32;

function isWide(char: string): boolean {
  const code = char.codePointAt(0) ?? 0;
  // CJK, kana, hangul e formas de largura total
  return code >= 0x2e80 && code <= 0xffef;
}

/**
 * Largura aproximada em pixels (sem medir fontes)
 */
export function estimateTextWidth(text: string, fontSize: number): number {
  let width = 0;
  for (const char of text) {
    width += isWide(char) ? fontSize : fontSize * 0.55;
  }
  return width;
}

function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let word = '';
  for (const char of text) {
    if (isWide(char)) {
      if (word) tokens.push(word);
      tokens.push(char);
      word = '';
    } else if (char === ' ') {
      tokens.push(`${word} `);
      word = '';
    } else {
      word += char;
    }
  }
  if (word) tokens.push(word);
  return tokens;
}

/**
 * Quebra o texto em linhas que cabem em maxWidth.
 * Palavras são mantidas inteiras quando possível; CJK quebra por caractere.
 */
export function wrapText(text: string, maxWidth: number, fontSize: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split(/\r?\n/)) {
    let line = '';
    for (const token of tokenize(paragraph)) {
      if (estimateTextWidth((line + token).trimEnd(), fontSize) <= maxWidth) {
        line += token;
        continue;
      }
      if (line) {
        lines.push(line.trimEnd());
        line = '';
      }
      if (estimateTextWidth(token.trimEnd(), fontSize) <= maxWidth) {
        line = token;
        continue;
      }
      // Palavra maior que a linha: quebra por caractere
      for (const char of token) {
        if (line && estimateTextWidth((line + char).trimEnd(), fontSize) > maxWidth) {
          lines.push(line.trimEnd());
          line = '';
        }
        line += char;
      }
    }
    lines.push(line.trimEnd());
  }

  return lines;
}

export function fitFontSize(rectHeight: number): number {
  return Math.min(MAX_FONT_SIZE, Math.max(MIN_FONT_SIZE, Math.round(rectHeight * 0.75)));
}

/**
 * Rótulo logo abaixo da caixa, alinhado à esquerda; cresce para a direita até a
 * borda da imagem e depois para baixo. Sem espaço embaixo, vai para cima da caixa.
 */
export function layoutBelow(rect: PixelRect, text: string, style: OverlayStyle, image: ImageSize): LabelLayout {
  const fontSize = style.fontSize;
  const lineHeight = Math.round(fontSize * 1.25);
  const maxWidth = Math.max(rect.width, image.width - rect.left);
  const natural = Math.ceil(estimateTextWidth(text, fontSize)) + style.padding * 2;
  const width = Math.min(maxWidth, Math.max(rect.width, natural));
  const lines = wrapText(text, width - style.padding * 2, fontSize);
  const height = lines.length * lineHeight + style.padding * 2;

  let y = rect.top + rect.height;
  if (y + height > image.height) {
    y = Math.max(0, rect.top - height);
  }

  return { x: rect.left, y, width, height, fontSize, lineHeight, lines };
}

/**
 * Texto dentro da própria caixa (modo replace)
 */
export function layoutReplace(rect: PixelRect, text: string, style: OverlayStyle, image: ImageSize): LabelLayout {
  const fontSize = fitFontSize(rect.height);
  const lineHeight = Math.round(fontSize * 1.2);
  const lines = wrapText(text, Math.max(1, rect.width - style.padding * 2), fontSize);
  const needed = lines.length * lineHeight + style.padding * 2;
  const height = Math.min(Math.max(rect.height, needed), image.height - rect.top);

  return { x: rect.left, y: rect.top, width: rect.width, height, fontSize, lineHeight, lines };
}

export function luminance(color: Rgb): number {
  return (0.299 * color.r + 0.587 * color.g + 0.114 * color.b) / 255;
}

export function contrastingTextColor(background: Rgb): string {
  return luminance(background) > 0.5 ? '#000000' : '#ffffff';
}

export function toHex(color: Rgb): string {
  const channel = (value: number) =>
    Math.min(255, Math.max(0, Math.round(value)))
      .toString(16)
      .padStart(2, '0');
  return `#${channel(color.r)}${channel(color.g)}${channel(color.b)}`;
}

// Controles C0 fora de \t \n \r são proibidos em XML 1.0
const XML_FORBIDDEN = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

export function escapeXml(text: string): string {
  return text
    .replace(XML_FORBIDDEN, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function labelSvg(
  layout: LabelLayout,
  colors: { text: string; background: string; opacity: number },
  fontFamily: string,
  padding: number
): string {
  const tspans = layout.lines
    .map((line, index) => {
      const baseline = layout.y + padding + index * layout.lineHeight + layout.fontSize;
      return `<tspan x="${layout.x + padding}" y="${baseline}">${escapeXml(line)}</tspan>`;
    })
    .join('');

  return (
    `<rect x="${layout.x}" y="${layout.y}" width="${layout.width}" height="${layout.height}" ` +
    `fill="${colors.background}" fill-opacity="${colors.opacity}"/>` +
    `<text font-family="${escapeXml(fontFamily)}" font-size="${layout.fontSize}" fill="${colors.text}">${tspans}</text>`
  );
}
