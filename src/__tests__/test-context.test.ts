import { describe, it } from 'node:test';
import assert from 'node:assert';
import path from 'path';
import { fileURLToPath } from 'url';
import { TestContext, detectTestLocationFromStack } from '../test-context.js';

const THIS_FILE = path.relative(process.cwd(), fileURLToPath(import.meta.url)).split(path.sep).join('/');

const CWD = '/home/dev/shop';

describe('detectTestLocationFromStack', () => {
  it('returns the first test-file frame relative to cwd, without line and column', () => {
    const stack = [
      'Error',
      '    at query (/home/dev/shop/src/db.ts:40:11)',
      '    at Object.<anonymous> (/home/dev/shop/test/orders.test.ts:12:5)',
      '    at other (/home/dev/shop/test/users.test.ts:3:1)',
    ].join('\n');
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), 'test/orders.test.ts');
  });

  it('reads frames without a function name and strips file URLs', () => {
    const stack = 'Error\n    at file:///home/dev/shop/src/cart.spec.ts:8:2';
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), 'src/cart.spec.ts');
  });

  it('gives the same identity from any checkout directory', () => {
    const frame = (root: string) => `Error\n    at t (${root}/test/orders.test.ts:12:5)`;
    assert.strictEqual(
      detectTestLocationFromStack(frame('/home/alice/shop'), '/home/alice/shop'),
      detectTestLocationFromStack(frame('/builds/ci/shop'), '/builds/ci/shop'),
    );
  });

  it('keeps a test file outside cwd absolute', () => {
    const stack = 'Error\n    at t (/opt/shared/test/orders.test.ts:1:1)';
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), '/opt/shared/test/orders.test.ts');
  });

  it('charges a helper frame to the test that called it', () => {
    const stack = [
      'Error',
      '    at query (/home/dev/shop/src/db.ts:40:11)',
      '    at createUser (/home/dev/shop/spec/support/factories.ts:8:3)',
      '    at Object.<anonymous> (/home/dev/shop/spec/models/user.spec.ts:21:5)',
    ].join('\n');
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), 'spec/models/user.spec.ts');
  });

  it('takes the outermost test-directory frame when no frame is named like a test', () => {
    const stack = [
      'Error',
      '    at helper (/home/dev/shop/test/support/db.ts:4:4)',
      '    at run (/home/dev/shop/test/orders.ts:9:1)',
    ].join('\n');
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), 'test/orders.ts');
  });

  it('skips node internals and dependencies', () => {
    const stack = [
      'Error',
      '    at Test.run (node:internal/test_runner/test:1:1)',
      '    at run (/home/dev/shop/node_modules/runner/test/index.test.js:1:1)',
      '    at helper (/home/dev/shop/spec/support/db.ts:4:4)',
    ].join('\n');
    assert.strictEqual(detectTestLocationFromStack(stack, CWD), 'spec/support/db.ts');
  });

  it('returns null when no frame looks like a test', () => {
    assert.strictEqual(detectTestLocationFromStack('Error\n    at main (/home/dev/shop/src/index.ts:1:1)', CWD), null);
    assert.strictEqual(detectTestLocationFromStack(undefined), null);
    assert.strictEqual(detectTestLocationFromStack(''), null);
  });
});

describe('TestContext', () => {
  it('is empty outside any test when sniffing is off', () => {
    assert.strictEqual(new TestContext({ sniffStack: false }).current(), null);
  });

  it('scopes run() across awaits', async () => {
    const context = new TestContext({ sniffStack: false });
    const seen = await context.run('test/orders.test.ts:12', async () => {
      await new Promise(resolve => setImmediate(resolve));
      return context.current();
    });
    assert.strictEqual(seen, 'test/orders.test.ts');
    assert.strictEqual(context.current(), null);
  });

  it('keeps concurrent runs apart', async () => {
    const context = new TestContext({ sniffStack: false });
    const observe = (loc: string, delay: number) => context.run(loc, async () => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return context.current();
    });
    const [a, b] = await Promise.all([observe('test/a.test.ts', 10), observe('test/b.test.ts', 1)]);
    assert.strictEqual(a, 'test/a.test.ts');
    assert.strictEqual(b, 'test/b.test.ts');
  });

  it('uses the hook-set value until exit()', () => {
    const context = new TestContext({ sniffStack: false });
    context.enter('spec/models/user.spec.ts:42');
    assert.strictEqual(context.current(), 'spec/models/user.spec.ts');
    context.exit();
    assert.strictEqual(context.current(), null);
  });

  it('prefers run() over enter()', () => {
    const context = new TestContext({ sniffStack: false });
    context.enter('test/outer.test.ts');
    assert.strictEqual(context.run('test/inner.test.ts', () => context.current()), 'test/inner.test.ts');
    context.exit();
  });

  it('sniffs the caller stack as a last resort', () => {
    const context = new TestContext();
    assert.strictEqual(context.current(), THIS_FILE);
  });
});
