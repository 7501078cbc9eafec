import { parentPort, workerData } from 'node:worker_threads';
import { Matcher } from './matcher.js';
import { serveMatchRequests, workerDataSchema } from './match-protocol.js';

const port = parentPort;

if (!port) {
  throw new Error('match-worker must be spawned as a worker thread');
}

const { scale } = workerDataSchema.parse(workerData ?? {});

serveMatchRequests(
  {
    onMessage: (listener) => port.on('message', listener),
    post: (response) => port.postMessage(response),
  },
  new Matcher({ scale }),
);
