import winston from 'winston';
import { flushLogger, logger } from '../../src/utils/logging.js';

describe('flushLogger', () => {
  beforeEach(() => {
    logger.clear();
    logger.add(new winston.transports.Console({ silent: true }));
  });

  it('should end the logger and resolve once it has finished', async () => {
    const finished = jest.fn();
    logger.once('finish', finished);
    logger.info('Build finished', { insertedCount: 3 });

    // The fallback timer is longer than the test timeout, so only 'finish' can resolve it
    await flushLogger(60000);

    expect(finished).toHaveBeenCalledTimes(1);
  });

  it('should return the same flush on repeated calls', () => {
    const first = flushLogger();

    expect(flushLogger()).toBe(first);
  });
});
