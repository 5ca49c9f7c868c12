import { expect } from 'chai';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, loadConfig } from '../src/config';

describe('loadConfig', () => {
  let tmp: string;

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'todo-config-'));
  });

  afterEach(() => {
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  it('uses defaults when no config file exists', () => {
    expect(loadConfig(tmp)).to.deep.equal({
      ...DEFAULT_CONFIG,
      file: path.join(tmp, 'todoServer.json')
    });
  });

  it('reads todo-server.config.json', () => {
    fs.writeFileSync(
      path.join(tmp, 'todo-server.config.json'),
      JSON.stringify({ host: '0.0.0.0', port: 9090, file: 'data/tasks.json', logLevel: 'debug', requestTimeoutMs: 2500, maxBodyBytes: 4096 })
    );
    expect(loadConfig(tmp)).to.deep.equal({
      host: '0.0.0.0',
      port: 9090,
      file: path.join(tmp, 'data', 'tasks.json'),
      logLevel: 'debug',
      requestTimeoutMs: 2500,
      maxBodyBytes: 4096
    });
  });

  it('prefers todo-server.config.json over .todoserverrc.json', () => {
    fs.writeFileSync(path.join(tmp, 'todo-server.config.json'), JSON.stringify({ port: 1111 }));
    fs.writeFileSync(path.join(tmp, '.todoserverrc.json'), JSON.stringify({ port: 2222 }));
    expect(loadConfig(tmp).port).to.equal(1111);
  });

  it('falls back per field on invalid values', () => {
    fs.writeFileSync(
      path.join(tmp, '.todoserverrc.json'),
      JSON.stringify({ host: '', port: 70000, logLevel: 'loud', requestTimeoutMs: -1, maxBodyBytes: 0 })
    );
    const config = loadConfig(tmp);
    expect(config.host).to.equal('localhost');
    expect(config.port).to.equal(8888);
    expect(config.logLevel).to.equal('info');
    expect(config.requestTimeoutMs).to.equal(10000);
    expect(config.maxBodyBytes).to.equal(1048576);
  });

  it('keeps an absolute file path as given', () => {
    const absolute = path.join(os.tmpdir(), 'elsewhere', 'todo.json');
    fs.writeFileSync(path.join(tmp, '.todoserverrc.json'), JSON.stringify({ file: absolute }));
    expect(loadConfig(tmp).file).to.equal(absolute);
  });

  it('throws on a config file that is not JSON', () => {
    fs.writeFileSync(path.join(tmp, '.todoserverrc.json'), 'port=1');
    expect(() => loadConfig(tmp)).to.throw(/is not valid JSON/);
  });
});
