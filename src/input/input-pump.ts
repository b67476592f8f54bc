// Input pump: forwards terminal key/mouse events to the render loop

import type { Readable } from 'stream';

import { logger } from '../logger.js';
import type { InputEvent } from '../types.js';
import { Channel } from './channel.js';
import { decodeInput } from './decode.js';

export class InputPump {
  private running = false;

  private readonly onData = (chunk: Buffer | string): void => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf-8');
    for (const event of decodeInput(text)) {
      if (event.type === 'key') {
        logger.debug('key_event %s', event.key.name);
      } else {
        logger.debug('mouse_event %s', event.action);
      }
      this.events.send(event);
    }
  };

  private readonly onError = (error: Error): void => {
    logger.error('Terminal input failed: %s', error.message);
    this.detach();
    this.events.close(error);
  };

  private readonly onEnd = (): void => {
    logger.error('Terminal input stream ended');
    this.detach();
    this.events.close(new Error('Terminal input stream ended'));
  };

  constructor(
    private readonly input: Readable,
    private readonly events: Channel<InputEvent>
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;

    this.input.on('data', this.onData);
    this.input.on('error', this.onError);
    this.input.on('end', this.onEnd);
    this.input.resume();
  }

  /**
   * Stop forwarding input. Events already on the channel stay there.
   */
  stop(): void {
    if (!this.running) return;
    this.detach();
    this.input.pause();
  }

  get isRunning(): boolean {
    return this.running;
  }

  private detach(): void {
    this.running = false;
    this.input.off('data', this.onData);
    this.input.off('error', this.onError);
    this.input.off('end', this.onEnd);
  }
}
