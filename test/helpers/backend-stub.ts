import * as http from 'node:http';

export interface RecordedRequest {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export interface StubReply {
  status: number;
  body: string;
  contentType?: string;
}

/**
 * In-process stand-in for the inference backend. Records every request and
 * answers with whatever `reply` currently holds.
 */
export class BackendStub {
  readonly requests: RecordedRequest[] = [];
  reply: StubReply = {
    status: 200,
    body: JSON.stringify({ id: 'x', choices: [] }),
  };

  private readonly server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      this.requests.push({
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf-8'),
      });
      res.writeHead(this.reply.status, {
        'Content-Type': this.reply.contentType ?? 'application/json',
      });
      res.end(this.reply.body);
    });
  });

  async start(): Promise<string> {
    await new Promise<void>((resolve) => {
      this.server.listen(0, '127.0.0.1', resolve);
    });
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Backend stub is not listening on a TCP port');
    }
    return `http://127.0.0.1:${address.port}`;
  }

  async stop(): Promise<void> {
    this.server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}

/**
 * A loopback URL nothing is listening on
 */
export async function unreachableUrl(): Promise<string> {
  const stub = new BackendStub();
  const url = await stub.start();
  await stub.stop();
  return url;
}
