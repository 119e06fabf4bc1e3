/**
 * IDecompressor over zlib inflate streams
 */

import fs from 'fs';
import zlib from 'zlib';
import { pipeline } from 'stream/promises';
import { IDecompressor } from '../../domain/interfaces';

export class ZlibDecompressor implements IDecompressor {
  async decompress(source: string, destination: string): Promise<void> {
    await pipeline(
      fs.createReadStream(source),
      zlib.createInflate(),
      fs.createWriteStream(destination)
    );
  }
}
