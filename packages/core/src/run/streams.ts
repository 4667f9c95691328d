import { IoError } from '@moonfmt/shared';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decodes bytes as UTF-8, rejecting malformed input rather than substituting characters.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch (cause) {
    throw new IoError('stream did not contain valid UTF-8', { cause });
  }
}

export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return decodeUtf8(Buffer.concat(chunks));
}

/**
 * Writes one payload and resolves once the stream has accepted it.
 *
 * A failed write is also emitted as `'error'` after the callback runs, and an unheard `'error'`
 * is thrown, so a listener stays attached until that event arrives. A stream that was
 * already destroyed emits nothing more.
 */
export function writeAll(stream: NodeJS.WritableStream, data: string | Uint8Array): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => reject(error);
    stream.once('error', onError);
    stream.write(data, (error?: Error | null) => {
      if (!error) {
        stream.removeListener('error', onError);
        resolve();
        return;
      }
      if (isDestroyed(stream)) {
        stream.removeListener('error', onError);
      }
      reject(error);
    });
  });
}

function isDestroyed(stream: NodeJS.WritableStream): boolean {
  return 'destroyed' in stream && stream.destroyed === true;
}
