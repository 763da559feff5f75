import { DeliveryPromise } from './DeliveryPromise';

describe('DeliveryPromise', () => {
  it('should start pending', () => {
    const promise = new DeliveryPromise();

    expect(promise.isPending()).toBe(true);
    expect(promise.isResolved()).toBe(false);
    expect(promise.isRejected()).toBe(false);
  });

  describe('resolve', () => {
    it('should settle with the resolved value', async () => {
      const promise = new DeliveryPromise();

      const result = promise.resolve({ id: '42' });

      expect(result).toBe(promise);
      expect(promise.isResolved()).toBe(true);
      await expect(promise.wait()).resolves.toEqual({ state: 'resolved', value: { id: '42' } });
    });

    it('should ignore a reject after resolving', async () => {
      const promise = new DeliveryPromise();

      promise.resolve({ id: '42' }).reject('too late');

      expect(promise.isRejected()).toBe(false);
      await expect(promise.value()).resolves.toEqual({ state: 'resolved', value: { id: '42' } });
    });
  });

  describe('reject', () => {
    it('should settle with the reason', async () => {
      const promise = new DeliveryPromise();

      promise.reject('boom');

      expect(promise.isRejected()).toBe(true);
      await expect(promise.wait()).resolves.toEqual({ state: 'rejected', reason: 'boom' });
    });

    it('should keep the first reason', async () => {
      const promise = new DeliveryPromise();

      promise.reject('first').reject('second').resolve({ id: '1' });

      await expect(promise.wait()).resolves.toEqual({ state: 'rejected', reason: 'first' });
    });
  });

  describe('wait', () => {
    it('should wait for a later settlement', async () => {
      const promise = new DeliveryPromise();
      const waiting = promise.wait();

      setTimeout(() => promise.resolve({ id: '7', url: 'https://errors.example.test/7' }), 0);

      await expect(waiting).resolves.toEqual({
        state: 'resolved',
        value: { id: '7', url: 'https://errors.example.test/7' },
      });
    });
  });

  describe('callbacks', () => {
    it('should run onResolved callbacks on settlement', () => {
      const promise = new DeliveryPromise();
      const onResolved = jest.fn();
      const onRejected = jest.fn();
      promise.onResolved(onResolved).onRejected(onRejected);

      promise.resolve({ id: '42' });

      expect(onResolved).toHaveBeenCalledWith({ id: '42' });
      expect(onRejected).not.toHaveBeenCalled();
    });

    it('should run a callback immediately when already settled', () => {
      const promise = new DeliveryPromise().reject('boom');
      const onRejected = jest.fn();
      const onResolved = jest.fn();

      promise.onRejected(onRejected).onResolved(onResolved);

      expect(onRejected).toHaveBeenCalledWith('boom');
      expect(onResolved).not.toHaveBeenCalled();
    });

    it('should run every callback when one throws and then rethrow', async () => {
      const promise = new DeliveryPromise();
      const later = jest.fn();
      promise
        .onRejected(() => {
          throw new Error('callback failed');
        })
        .onRejected(later);

      expect(() => promise.reject('boom')).toThrow('callback failed');

      expect(later).toHaveBeenCalledWith('boom');
      expect(promise.isRejected()).toBe(true);
      await expect(promise.wait()).resolves.toEqual({ state: 'rejected', reason: 'boom' });
    });

    it('should run each callback once', () => {
      const promise = new DeliveryPromise();
      const onRejected = jest.fn();
      promise.onRejected(onRejected);

      promise.reject('a');
      promise.reject('b');

      expect(onRejected).toHaveBeenCalledTimes(1);
    });
  });
});
