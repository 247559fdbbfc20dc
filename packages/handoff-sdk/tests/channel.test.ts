import { AsyncChannel } from '../src/utils/channel';

describe('AsyncChannel', () => {
  it('delivers buffered values before ending', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    channel.close();

    const seen: number[] = [];
    for await (const value of channel) {
      seen.push(value);
    }
    expect(seen).toEqual([1, 2]);
  });

  it('wakes a waiting reader', async () => {
    const channel = new AsyncChannel<string>();
    const next = channel.next();
    channel.push('a');
    await expect(next).resolves.toEqual({ value: 'a', done: false });
  });

  it('ends pending reads on close and refuses later pushes', async () => {
    const channel = new AsyncChannel<string>();
    const next = channel.next();
    channel.close();
    await expect(next).resolves.toEqual({ value: undefined, done: true });
    expect(channel.push('late')).toBe(false);
  });

  it('rejects readers after fail', async () => {
    const channel = new AsyncChannel<string>();
    const next = channel.next();
    channel.fail(new Error('boom'));
    await expect(next).rejects.toThrow('boom');
    await expect(channel.next()).rejects.toThrow('boom');
  });

  it('closes when the consumer breaks out of the loop', async () => {
    const channel = new AsyncChannel<number>();
    channel.push(1);
    channel.push(2);
    for await (const value of channel) {
      expect(value).toBe(1);
      break;
    }
    expect(channel.isClosed).toBe(true);
  });

  it('runs the return hook when iteration stops early', async () => {
    const channel = new AsyncChannel<number>();
    const onReturn = jest.fn();
    channel.push(1);

    const iterator = channel.iterator(onReturn);
    await expect(iterator.next()).resolves.toEqual({ value: 1, done: false });
    await iterator.return?.();

    expect(onReturn).toHaveBeenCalledTimes(1);
    expect(channel.isClosed).toBe(true);
  });
});
