/**
 * @jest-environment jsdom
 */
import KeyboardInput from './KeyboardInput';

function press(key: string, repeat = false) {
  window.dispatchEvent(new KeyboardEvent('keydown', { key, repeat }));
}

describe('KeyboardInput', () => {
  let input: KeyboardInput;

  beforeEach(() => {
    jest.useFakeTimers();
    input = new KeyboardInput(window);
  });

  afterEach(() => {
    input.dispose();
    jest.useRealTimers();
  });

  test('returns a key pressed before the poll immediately', async () => {
    press('ArrowUp');
    expect(input.pendingKeys).toBe(1);
    await expect(input.poll(100)).resolves.toBe('ArrowUp');
  });

  test('resolves a waiting poll with the next key', async () => {
    const poll = input.poll(100);
    press('ArrowLeft');
    await expect(poll).resolves.toBe('ArrowLeft');
    expect(input.pendingKeys).toBe(0);
  });

  test('resolves null when the timeout runs out', async () => {
    const poll = input.poll(100);
    jest.advanceTimersByTime(100);
    await expect(poll).resolves.toBeNull();
  });

  test('ignores auto-repeated keydown events', () => {
    press('ArrowDown', true);
    expect(input.pendingKeys).toBe(0);
  });

  test('keeps only the most recent 32 keys', async () => {
    for (let i = 0; i < 40; i++) {
      press(String(i));
    }
    expect(input.pendingKeys).toBe(32);
    await expect(input.poll(0)).resolves.toBe('8');
  });

  test('rejects a second concurrent poller', async () => {
    const first = input.poll(100);
    await expect(input.poll(100)).rejects.toThrow('KeyboardInput supports a single poller at a time');
    press('q');
    await expect(first).resolves.toBe('q');
  });

  test('dispose releases the waiting poll and stops listening', async () => {
    const poll = input.poll(1000);
    input.dispose();

    await expect(poll).resolves.toBeNull();
    press('ArrowUp');
    expect(input.pendingKeys).toBe(0);
    await expect(input.poll(10)).resolves.toBeNull();
  });
});
