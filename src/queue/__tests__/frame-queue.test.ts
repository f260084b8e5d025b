import { FrameQueue } from '../frame-queue';

jest.mock('../../shared/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn()
  }
}));

const frame = (text: string) => Buffer.from(text, 'utf-8');

describe('FrameQueue', () => {
  let queue: FrameQueue;

  beforeEach(() => {
    queue = new FrameQueue('test-queue', 2);
  });

  it('should reject a capacity that is not a positive integer', () => {
    expect(() => new FrameQueue('bad', 0)).toThrow(RangeError);
    expect(() => new FrameQueue('bad', 1.5)).toThrow('Queue capacity must be a positive integer, got 1.5');
  });

  it('should hand out frames in arrival order', async () => {
    queue.push(frame('a'));
    queue.push(frame('b'));

    expect((await queue.next())?.toString()).toBe('a');
    expect((await queue.next())?.toString()).toBe('b');
  });

  it('should deliver a frame straight to a waiting reader', async () => {
    const pending = queue.next();

    expect(queue.push(frame('late'))).toBe(true);
    expect((await pending)?.toString()).toBe('late');
    expect(queue.getStats()).toEqual({ buffered: 0, received: 1, dropped: 0, closed: false });
  });

  it('should drop frames once full', () => {
    const onDrop = jest.fn();
    queue.on('frame-dropped', onDrop);

    expect(queue.push(frame('a'))).toBe(true);
    expect(queue.push(frame('b'))).toBe(true);
    expect(queue.push(frame('c'))).toBe(false);

    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop.mock.calls[0][0].toString()).toBe('c');
    expect(queue.getStats()).toEqual({ buffered: 2, received: 3, dropped: 1, closed: false });
  });

  describe('close', () => {
    it('should release waiting readers with null', async () => {
      const first = queue.next();
      const second = queue.next();

      queue.close();

      await expect(first).resolves.toBeNull();
      await expect(second).resolves.toBeNull();
    });

    it('should discard buffered frames and refuse new ones', async () => {
      queue.push(frame('a'));
      queue.close();

      expect(queue.push(frame('b'))).toBe(false);
      await expect(queue.next()).resolves.toBeNull();
      expect(queue.getStats()).toEqual({ buffered: 0, received: 1, dropped: 0, closed: true });
      expect(queue.isClosed()).toBe(true);
    });

    it('should emit closed once', () => {
      const onClosed = jest.fn();
      queue.on('closed', onClosed);

      queue.close();
      queue.close();

      expect(onClosed).toHaveBeenCalledTimes(1);
    });
  });

  describe('fail', () => {
    it('should reject waiting and later readers with the error', async () => {
      const pending = queue.next();
      const error = new Error('socket gone');

      queue.fail(error);

      await expect(pending).rejects.toBe(error);
      await expect(queue.next()).rejects.toBe(error);
      expect(queue.isClosed()).toBe(true);
    });

    it('should have no effect after close', async () => {
      queue.close();
      queue.fail(new Error('too late'));

      await expect(queue.next()).resolves.toBeNull();
    });
  });
});
