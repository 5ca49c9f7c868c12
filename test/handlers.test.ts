import { strict as assert } from 'assert';
import { DecodeError, NotFoundError, PayloadTooLargeError, statusForError, StorageError, ValidationError } from '../src/todo/errors';
import { decodeNewTask, matchRoute, parsePosition, splitTarget } from '../src/todo/handlers';

describe('handlers', () => {
  describe('matchRoute', () => {
    it('distinguishes root, collection and item paths', () => {
      assert.deepEqual(matchRoute('/'), { kind: 'root' });
      assert.deepEqual(matchRoute('/todo'), { kind: 'collection' });
      assert.deepEqual(matchRoute('/todo/'), { kind: 'collection' });
      assert.deepEqual(matchRoute('/todo/12'), { kind: 'item', segment: '12' });
    });

    it('does not match nested or foreign paths', () => {
      assert.deepEqual(matchRoute('/todo/1/2'), { kind: 'none' });
      assert.deepEqual(matchRoute('/todos'), { kind: 'none' });
      assert.deepEqual(matchRoute('/favicon.ico'), { kind: 'none' });
    });
  });

  describe('splitTarget', () => {
    it('keeps the raw path and parses the query', () => {
      const { pathname, query } = splitTarget('/todo/1?complete');
      assert.equal(pathname, '/todo/1');
      assert.equal(query.has('complete'), true);
    });

    it('never reads a host out of the target', () => {
      assert.equal(splitTarget('//todo').pathname, '//todo');
      assert.equal(matchRoute(splitTarget('//todo').pathname).kind, 'none');
      assert.equal(splitTarget('/todo').query.toString(), '');
    });
  });

  describe('parsePosition', () => {
    it('parses decimal positions', () => {
      assert.equal(parsePosition('1'), 1);
      assert.equal(parsePosition('042'), 42);
    });

    it('treats non-numeric ids as bad requests', () => {
      assert.throws(() => parsePosition('abc'), ValidationError);
      assert.throws(() => parsePosition('-1'), ValidationError);
      assert.throws(() => parsePosition('1.5'), ValidationError);
    });

    it('treats zero as a missing task', () => {
      assert.throws(() => parsePosition('0'), NotFoundError);
    });
  });

  describe('decodeNewTask', () => {
    it('returns the task text', () => {
      assert.equal(decodeNewTask('{"task":"Buy milk"}'), 'Buy milk');
    });

    it('fails to decode malformed or mistyped bodies', () => {
      assert.throws(() => decodeNewTask(''), DecodeError);
      assert.throws(() => decodeNewTask('[]'), DecodeError);
      assert.throws(() => decodeNewTask('{"title":"x"}'), DecodeError);
    });

    it('rejects an empty description', () => {
      assert.throws(() => decodeNewTask('{"task":""}'), ValidationError);
    });
  });

  describe('statusForError', () => {
    it('maps error kinds to status codes', () => {
      assert.equal(statusForError(new ValidationError('x')), 400);
      assert.equal(statusForError(new DecodeError('x')), 400);
      assert.equal(statusForError(new NotFoundError('x')), 404);
      assert.equal(statusForError(new PayloadTooLargeError('x')), 413);
      assert.equal(statusForError(new StorageError('x')), 500);
      assert.equal(statusForError(new Error('x')), 500);
    });
  });
});
