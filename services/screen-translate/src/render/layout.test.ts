import { describe, expect, it } from 'vitest';
import { DEFAULT_OVERLAY_STYLE } from '@screenlingo/shared';
import {
  contrastingTextColor,
  escapeXml,
  estimateTextWidth,
  fitFontSize,
  labelSvg,
  layoutBelow,
  layoutReplace,
  toHex,
  wrapText,
} from './layout';

describe('estimateTextWidth', () => {
  it('counts wide characters at full font size', () => {
    expect(estimateTextWidth('ab', 10)).toBeCloseTo(11);
    expect(estimateTextWidth('你好', 10)).toBe(20);
  });
});

describe('wrapText', () => {
  it('breaks between words', () => {
    expect(wrapText('aaa bbb', 20, 10)).toEqual(['aaa', 'bbb']);
  });

  it('breaks CJK text between characters', () => {
    expect(wrapText('你好世界', 25, 10)).toEqual(['你好', '世界']);
  });

  it('splits words longer than the line', () => {
    expect(wrapText('abcdefgh', 20, 10)).toEqual(['abc', 'def', 'gh']);
  });

  it('keeps explicit line breaks', () => {
    expect(wrapText('a\nb', 100, 10)).toEqual(['a', 'b']);
  });
});

describe('fitFontSize', () => {
  it('scales with the box height within limits', () => {
    expect(fitFontSize(20)).toBe(15);
    expect(fitFontSize(4)).toBe(10);
    expect(fitFontSize(100)).toBe(32);
  });
});

describe('layoutBelow', () => {
  const image = { width: 200, height: 100 };

  it('places the label under the box, at least as wide as it', () => {
    const layout = layoutBelow({ left: 10, top: 10, width: 50, height: 20 }, 'Hi', DEFAULT_OVERLAY_STYLE, image);

    expect(layout).toEqual({ x: 10, y: 30, width: 50, height: 28, fontSize: 16, lineHeight: 20, lines: ['Hi'] });
  });

  it('moves above the box near the bottom edge', () => {
    const layout = layoutBelow({ left: 10, top: 80, width: 50, height: 15 }, 'Hi', DEFAULT_OVERLAY_STYLE, image);

    expect(layout.y).toBe(52);
  });

  it('grows to the right edge before wrapping', () => {
    const text = 'a'.repeat(40);
    const layout = layoutBelow({ left: 100, top: 0, width: 20, height: 10 }, text, DEFAULT_OVERLAY_STYLE, image);

    expect(layout.width).toBe(100);
    expect(layout.lines.length).toBeGreaterThan(1);
    expect(layout.lines.join('')).toBe(text);
  });
});

describe('layoutReplace', () => {
  it('fits the text inside the box', () => {
    const layout = layoutReplace({ left: 0, top: 0, width: 100, height: 20 }, 'Olá', DEFAULT_OVERLAY_STYLE, {
      width: 200,
      height: 100,
    });

    expect(layout).toEqual({ x: 0, y: 0, width: 100, height: 26, fontSize: 15, lineHeight: 18, lines: ['Olá'] });
  });
});

describe('colors', () => {
  it('picks dark text on light backgrounds', () => {
    expect(contrastingTextColor({ r: 255, g: 255, b: 255 })).toBe('#000000');
    expect(contrastingTextColor({ r: 20, g: 30, b: 40 })).toBe('#ffffff');
  });

  it('formats clamped hex colors', () => {
    expect(toHex({ r: 255, g: 128.4, b: -3 })).toBe('#ff8000');
  });
});

describe('labelSvg', () => {
  it('escapes text and positions each line', () => {
    const svg = labelSvg(
      { x: 10, y: 30, width: 50, height: 48, fontSize: 16, lineHeight: 20, lines: ['<a>', 'b & c'] },
      { text: '#ffffff', background: '#000000', opacity: 0.75 },
      'sans-serif',
      4
    );

    expect(svg).toBe(
      '<rect x="10" y="30" width="50" height="48" fill="#000000" fill-opacity="0.75"/>' +
        '<text font-family="sans-serif" font-size="16" fill="#ffffff">' +
        '<tspan x="14" y="50">&lt;a&gt;</tspan><tspan x="14" y="70">b &amp; c</tspan></text>'
    );
  });

  it('escapes quotes', () => {
    expect(escapeXml(`"it's"`)).toBe('&quot;it&apos;s&quot;');
  });

  it('drops control characters XML cannot carry', () => {
    expect(escapeXml('Mun\fdo\u0000\b\tok\r\n')).toBe('Mundo\tok\r\n');
  });
});
