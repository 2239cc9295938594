import { setTimeout as delay } from 'timers/promises';
import { abortError, isAbortError, sleep, waitWithTimeout } from '../../../src/utils/async';
import { errorMessage } from '../../../src/errors';

describe('async helpers', () => {
  describe('isAbortError', () => {
    it('should recognise the rejection of an aborted timers/promises timeout', async () => {
      const controller = new AbortController();
      const pending = delay(1000, undefined, { signal: controller.signal });
      controller.abort();

      const error = await pending.catch((err: unknown) => err);

      expect(isAbortError(error)).toBe(true);
    });

    it('should recognise an aborted sleep', async () => {
      const controller = new AbortController();
      const pending = sleep(1000, controller.signal);
      controller.abort();

      await expect(pending.catch(isAbortError)).resolves.toBe(true);
    });

    it('should recognise an abort error from another realm by its name', () => {
      expect(isAbortError({ name: 'AbortError', message: 'aborted' })).toBe(true);
      expect(isAbortError(abortError())).toBe(true);
    });

    it.each([[new Error('boom')], ['AbortError'], [null], [undefined], [{ message: 'x' }]])(
      'should reject %p',
      (value) => {
        expect(isAbortError(value)).toBe(false);
      },
    );
  });

  describe('waitWithTimeout', () => {
    it('should report a promise that settles in time', async () => {
      await expect(waitWithTimeout(Promise.reject(new Error('late')), 100)).resolves.toBe(true);
    });

    it('should give up on a promise that never settles', async () => {
      await expect(waitWithTimeout(new Promise(() => undefined), 20)).resolves.toBe(false);
    });
  });

  describe('errorMessage', () => {
    it('should read the message of error-like values', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
      expect(errorMessage({ message: 'from elsewhere' })).toBe('from elsewhere');
      expect(errorMessage(42)).toBe('42');
    });
  });
});
