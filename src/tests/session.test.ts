import { describe, expect, it, vi } from 'vitest';
import { retryAfterNavigation } from '../agent/session';

const navigating = () => new Error('page.content: Unable to retrieve content because the page is navigating and changing the content.');

describe('retryAfterNavigation', () => {
  it('waits for the new document and reads again', async () => {
    const op = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(navigating())
      .mockResolvedValueOnce('<ul class="js-results-group"></ul>');
    const settle = vi.fn(async () => {});

    expect(await retryAfterNavigation(op, settle)).toBe('<ul class="js-results-group"></ul>');
    expect(settle).toHaveBeenCalledTimes(1);
    expect(op).toHaveBeenCalledTimes(2);
  });

  it('retries a script whose context went away', async () => {
    const op = vi.fn<() => Promise<unknown>>()
      .mockRejectedValueOnce(new Error('page.evaluate: Execution context was destroyed, most likely because of a navigation'))
      .mockResolvedValueOnce(3200);

    expect(await retryAfterNavigation(op, async () => {})).toBe(3200);
  });

  it('passes other errors through untouched', async () => {
    const settle = vi.fn(async () => {});
    await expect(retryAfterNavigation(() => Promise.reject(new Error('Target closed')), settle)).rejects.toThrow('Target closed');
    expect(settle).not.toHaveBeenCalled();
  });

  it('gives up after one retry', async () => {
    const op = vi.fn<() => Promise<string>>().mockRejectedValue(navigating());
    await expect(retryAfterNavigation(op, async () => {})).rejects.toThrow('page is navigating');
    expect(op).toHaveBeenCalledTimes(2);
  });
});
