/**
 * Read all of stdin.
 *
 * Git writes the whole request and closes the pipe, so this resolves at end
 * of input. Run from a terminal, the request ends with Ctrl-D.
 */
export function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string | Buffer) => {
      data += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    });
    stream.on('end', () => resolve(data));
    stream.on('error', (err) => reject(err));
    stream.resume();
  });
}
