// Worker-thread entry for ElevenLabs jobs. Each message is one synthesis.
import { parentPort } from 'node:worker_threads';
import { errorMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { handleWorkerMessage } from './elevenlabs.js';

const port = parentPort;
if (!port) throw new Error('elevenlabs.worker must run inside a worker thread');

port.on('message', (msg: unknown) => {
  handleWorkerMessage(msg)
    .then((reply) => port.postMessage(reply))
    .catch((err: unknown) => {
      logger.error('ElevenLabs worker: reply failed', { error: errorMessage(err) });
      process.exitCode = 1;
    });
});
