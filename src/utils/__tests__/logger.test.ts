import { describe, expect, it } from 'vitest';
import { createLogger } from '../logger.js';

function memoryStream() {
  const lines: string[] = [];
  return {
    lines,
    write(message: string) {
      lines.push(message);
    },
  };
}

describe('createLogger', () => {
  it('delivers debug lines to every stream when the level allows them', () => {
    const stdout = memoryStream();
    const file = memoryStream();
    const log = createLogger({ name: 'news-digest', env: 'test', level: 'debug' }, [stdout, file]);

    log.debug({ subreddit: 'rust' }, 'Subreddit processed');

    for (const stream of [stdout, file]) {
      expect(stream.lines).toHaveLength(1);
      expect(JSON.parse(stream.lines[0] ?? '{}')).toMatchObject({
        level: 20,
        name: 'news-digest',
        env: 'test',
        subreddit: 'rust',
        msg: 'Subreddit processed',
      });
    }
  });

  it('still filters below the configured level', () => {
    const stdout = memoryStream();
    const file = memoryStream();
    const log = createLogger({ name: 'news-digest', env: 'test', level: 'warn' }, [stdout, file]);

    log.info('Starting pipeline');
    log.warn('Email not configured, skipping delivery');

    expect(stdout.lines.map((line) => JSON.parse(line).msg)).toEqual([
      'Email not configured, skipping delivery',
    ]);
    expect(file.lines).toHaveLength(1);
  });
});
