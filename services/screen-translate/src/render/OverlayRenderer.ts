import sharp from 'sharp';
import {
  BilingualSegment,
  CapturedImage,
  ImageSize,
  OverlayStyle,
  PixelRect,
  toPixelRect,
} from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';
import { Rgb, contrastingTextColor, labelSvg, layoutBelow, layoutReplace, toHex } from './layout';

const logger = getLogger();

/**
 * Compõe a imagem bilíngue: captura original + traduções nas posições das caixas
 */
export class OverlayRenderer {
  /**
   * Retorna PNG do tamanho da entrada, ou null quando a composição falha
   */
  async render(image: CapturedImage, segments: BilingualSegment[], style: OverlayStyle): Promise<Buffer | null> {
    try {
      const metadata = await sharp(image.data).metadata();
      const size: ImageSize = {
        width: metadata.width ?? image.width,
        height: metadata.height ?? image.height,
      };

      if (segments.length === 0) {
        return await sharp(image.data).png().toBuffer();
      }

      const elements: string[] = [];
      for (const segment of segments) {
        const rect = toPixelRect(segment.original.bbox, size);

        if (style.mode === 'replace') {
          const background = await this.regionColor(image.data, rect, size, metadata.hasAlpha ?? false);
          const layout = layoutReplace(rect, segment.translated, style, size);
          elements.push(
            labelSvg(
              layout,
              { text: contrastingTextColor(background), background: toHex(background), opacity: 1 },
              style.fontFamily,
              style.padding
            )
          );
        } else {
          const layout = layoutBelow(rect, segment.translated, style, size);
          elements.push(
            labelSvg(
              layout,
              { text: style.textColor, background: style.backgroundColor, opacity: style.backgroundOpacity },
              style.fontFamily,
              style.padding
            )
          );
        }
      }

      const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${size.width}" height="${size.height}">${elements.join('')}</svg>`;

      return await sharp(image.data)
        .composite([{ input: Buffer.from(svg), top: 0, left: 0 }])
        .png()
        .toBuffer();
    } catch (error) {
      logger.error({ err: error, segments: segments.length }, 'Overlay rendering failed');
      return null;
    }
  }

  /**
   * Cor média da região da caixa
   */
  private async regionColor(data: Buffer, rect: PixelRect, size: ImageSize, hasAlpha: boolean): Promise<Rgb> {
    const left = Math.min(rect.left, size.width - 1);
    const top = Math.min(rect.top, size.height - 1);
    const region = {
      left,
      top,
      width: Math.max(1, Math.min(rect.width, size.width - left)),
      height: Math.max(1, Math.min(rect.height, size.height - top)),
    };
    const stats = await sharp(data).extract(region).stats();
    // O canal alfa vem por último; cinza (+alfa) tem uma banda de cor só
    const colorBands = stats.channels.length - (hasAlpha ? 1 : 0);
    const [first, second, third] = stats.channels;
    const gray = first?.mean ?? 0;
    if (colorBands < 3 || !second || !third) {
      return { r: gray, g: gray, b: gray };
    }
    return { r: gray, g: second.mean, b: third.mean };
  }
}
