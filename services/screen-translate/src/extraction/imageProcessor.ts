import sharp from 'sharp';
import { readFile } from 'fs/promises';
import type { CapturedImage } from '@screenlingo/shared';
import { getLogger } from '@screenlingo/logger';

const logger = getLogger();

export interface PreparedImage {
  base64Raw: string;
  mimeType: string;
  width: number;
  height: number;
}

/**
 * Monta um CapturedImage a partir de um arquivo de imagem
 */
export async function loadCapturedImage(path: string, scaleFactor = 1): Promise<CapturedImage> {
  const data = await readFile(path);
  const metadata = await sharp(data, { failOnError: false }).metadata();
  if (!metadata.width || !metadata.height) {
    throw new Error(`Could not read image dimensions: ${path}`);
  }
  return { data, width: metadata.width, height: metadata.height, scaleFactor };
}

/**
 * Reduz a imagem para o limite do modelo (mantendo aspect ratio) e codifica em JPEG
 */
export async function prepareForVision(
  image: CapturedImage,
  options: { maxDimension: number; quality: number }
): Promise<PreparedImage> {
  const { data, info } = await sharp(image.data, { failOnError: false })
    .resize(options.maxDimension, options.maxDimension, {
      fit: 'inside',
      withoutEnlargement: true,
    })
    .flatten({ background: '#ffffff' })
    .jpeg({ quality: options.quality })
    .toBuffer({ resolveWithObject: true });

  if (info.width !== image.width || info.height !== image.height) {
    logger.debug(
      {
        original: `${image.width}x${image.height}`,
        compressed: `${info.width}x${info.height}`,
      },
      'Image resized for vision model'
    );
  }

  return {
    base64Raw: data.toString('base64'),
    mimeType: 'image/jpeg',
    width: info.width,
    height: info.height,
  };
}
