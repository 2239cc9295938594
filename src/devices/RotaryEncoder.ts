import { BinaryValue, Gpio } from 'onoff';
import { createLogger } from '../utils/logger';
import { EncoderPins, PulseCounter } from '../types/telemetry.types';

const logger = createLogger('RotaryEncoder');

// Quarter-step delta indexed by (previous state << 2) | current state, state = (A << 1) | B.
const TRANSITIONS = [0, -1, 1, 0, 1, 0, 0, -1, -1, 0, 0, 1, 0, 1, -1, 0];
const QUARTERS_PER_STEP = 4;

/**
 * Quadrature decoder over two GPIO inputs. A leading B counts up, B leading A counts
 * down; one step is a full cycle of four edges.
 */
export class RotaryEncoder implements PulseCounter {
  private readonly pinA: Gpio;
  private readonly pinB: Gpio;
  private lastState: number;
  private quarters = 0;

  constructor(pins: EncoderPins) {
    this.pinA = new Gpio(pins.pinA, 'in', 'both');
    this.pinB = new Gpio(pins.pinB, 'in', 'both');
    this.lastState = this.encode(this.pinA.readSync(), this.pinB.readSync());

    this.pinA.watch((err, value) => {
      if (err) {
        logger.error({ err, pin: pins.pinA }, 'GPIO watch error');
        return;
      }
      this.onEdge(value, this.pinB.readSync());
    });
    this.pinB.watch((err, value) => {
      if (err) {
        logger.error({ err, pin: pins.pinB }, 'GPIO watch error');
        return;
      }
      this.onEdge(this.pinA.readSync(), value);
    });
    logger.info(pins, 'Rotary encoder watching pins');
  }

  public get steps(): number {
    return Math.trunc(this.quarters / QUARTERS_PER_STEP);
  }

  public close(): void {
    this.pinA.unwatchAll();
    this.pinB.unwatchAll();
    this.pinA.unexport();
    this.pinB.unexport();
  }

  private onEdge(a: BinaryValue, b: BinaryValue): void {
    const state = this.encode(a, b);
    this.quarters += TRANSITIONS[(this.lastState << 2) | state];
    this.lastState = state;
  }

  private encode(a: BinaryValue, b: BinaryValue): number {
    return (a << 1) | b;
  }
}
