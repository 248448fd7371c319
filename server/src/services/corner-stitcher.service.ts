import { RasterImage } from '../models/raster-image';
import { CornerImages } from './slice-extractor.service';

export interface StitchedPreview {
  image: RasterImage;
  width: number;
  height: number;
}

export class CornerStitcher {
  /**
   * Join the four corners with the centre gap removed:
   *
   *   TL | TR
   *   ---+---
   *   BL | BR
   *
   * The result is (left + right) x (top + bottom). Zero-area corners
   * shrink the canvas on their axis; a 0x0 result is valid.
   */
  stitch(corners: CornerImages): StitchedPreview {
    const topLeft = corners['top-left'];
    const topRight = corners['top-right'];
    const bottomLeft = corners['bottom-left'];
    const bottomRight = corners['bottom-right'];

    const left = topLeft.width;
    const right = topRight.width;
    const top = topLeft.height;
    const bottom = bottomLeft.height;

    const width = left + right;
    const height = top + bottom;
    const canvas = RasterImage.blank(width, height);

    canvas.blit(topLeft, 0, 0);
    canvas.blit(topRight, left, 0);
    canvas.blit(bottomLeft, 0, top);
    canvas.blit(bottomRight, left, top);

    return { image: canvas, width, height };
  }
}
