import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';

export async function computeFileMd5(filePath: string): Promise<string> {
  const hash = createHash('md5');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}
