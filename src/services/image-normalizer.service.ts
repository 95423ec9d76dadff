import sharp from 'sharp';
import { CONFIG } from '../config';
import { ImageValidationError } from '../errors';

export interface ImageNormalizerOptions {
  quality: number;
  minDimension: number;
}

export interface ImageNormalizer {
  normalize(input: Buffer): Promise<Buffer>;
}

/**
 * Decodes a downloaded image, rejects thumbnails and re-encodes it as an
 * RGB JPEG
 */
export class SharpImageNormalizer implements ImageNormalizer {
  constructor(
    private readonly options: ImageNormalizerOptions = {
      quality: CONFIG.images.quality,
      minDimension: CONFIG.images.minDimension,
    }
  ) {}

  async normalize(input: Buffer): Promise<Buffer> {
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await sharp(input).metadata());
    } catch (error) {
      throw new ImageValidationError('Could not decode image', { cause: error });
    }

    if (width === undefined || height === undefined) {
      throw new ImageValidationError('Could not read image dimensions');
    }
    if (width < this.options.minDimension || height < this.options.minDimension) {
      throw new ImageValidationError(`Image too small: ${width}x${height}`);
    }

    try {
      return await sharp(input)
        .flatten({ background: '#ffffff' })
        .toColourspace('srgb')
        .jpeg({ quality: this.options.quality })
        .toBuffer();
    } catch (error) {
      throw new ImageValidationError('Could not re-encode image', { cause: error });
    }
  }
}
