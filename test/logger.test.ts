import { expect } from 'chai';
import { createLogger, formatLine, isLogLevel } from '../src/logger';

describe('logger', () => {
  const original = { info: console.info, warn: console.warn };
  let lines: string[];

  beforeEach(() => {
    lines = [];
    console.info = (line: string) => lines.push(`info:${line}`);
    console.warn = (line: string) => lines.push(`warn:${line}`);
  });

  afterEach(() => {
    console.info = original.info;
    console.warn = original.warn;
  });

  it('formats level, message and meta', () => {
    const line = formatLine('warn', 'disk slow', { ms: 12 });
    expect(line).to.match(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN disk slow \{"ms":12\}$/);
  });

  it('omits empty meta', () => {
    expect(formatLine('info', 'ready', {})).to.match(/\] INFO ready$/);
  });

  it('drops messages below the threshold', () => {
    const logger = createLogger('warn');
    logger.info('hidden');
    logger.warn('shown');
    expect(lines).to.have.length(1);
    expect(lines[0]).to.match(/^warn:.* WARN shown$/);
  });

  it('prints nothing when silent', () => {
    const logger = createLogger('silent');
    logger.info('a');
    logger.warn('b');
    expect(lines).to.deep.equal([]);
  });

  it('recognises log levels', () => {
    expect(isLogLevel('debug')).to.equal(true);
    expect(isLogLevel('silent')).to.equal(true);
    expect(isLogLevel('verbose')).to.equal(false);
    expect(isLogLevel(3)).to.equal(false);
  });
});
