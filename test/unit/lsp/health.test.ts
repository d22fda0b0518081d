import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  INDEX_STATUS_METHOD,
  attachIndexingProgress,
  registerIndexStatusHandlers,
  type IndexStatus,
  type IndexStatusConnection,
  type ProgressConnection,
  type ProgressReporter,
} from '../../../src/lsp/health.js';
import { StateStore } from '../../../src/lsp/workspace/state-store.js';
import { delay } from '../../helpers/test-utils.js';

function createStatusConnection(): { connection: IndexStatusConnection; request: () => IndexStatus; methods: string[] } {
  const methods: string[] = [];
  let handler: (() => IndexStatus) | undefined;
  return {
    methods,
    connection: {
      onRequest: (method, h) => {
        methods.push(method);
        handler = h;
      },
    },
    request: () => {
      assert.ok(handler, 'request handler should be registered');
      return handler();
    },
  };
}

function createProgressConnection(create?: () => Promise<ProgressReporter>): {
  connection: ProgressConnection;
  calls: string[];
} {
  const calls: string[] = [];
  const reporter: ProgressReporter = {
    begin: (title, _percentage, message) => calls.push(`begin:${title}:${message ?? ''}`),
    report: message => calls.push(`report:${message}`),
    done: () => calls.push('done'),
  };
  return {
    calls,
    connection: { window: { createWorkDoneProgress: create ?? (() => Promise.resolve(reporter)) } },
  };
}

describe('registerIndexStatusHandlers', () => {
  let store: StateStore | undefined;

  afterEach(() => {
    store?.dispose();
    store = undefined;
  });

  it('iac/indexStatus 返回文档、符号与队列统计', async () => {
    store = new StateStore();
    const { connection, request, methods } = createStatusConnection();
    registerIndexStatusHandlers(connection, store, () => ({
      enabled: true,
      mode: 'native',
      isRunning: false,
      trackedFiles: 0,
    }));

    store.openOrUpdateDocument('file:///ws/main.tf', 'provider "a" {}\nregion = "x"', 1);
    await store.wait();

    assert.deepEqual(methods, [INDEX_STATUS_METHOD]);
    assert.deepEqual(request(), {
      documents: 1,
      openDocuments: 1,
      symbols: 2,
      failedDocuments: 0,
      queue: { pending: 0, running: 0, completed: 2, failed: 0, coalesced: 0, total: 2 },
      roots: [],
      idle: true,
      watcher: { enabled: true, mode: 'native', isRunning: false, trackedFiles: 0 },
    });
  });

  it('未提供 watcher 时省略该字段', () => {
    store = new StateStore();
    const { connection, request } = createStatusConnection();
    registerIndexStatusHandlers(connection, store);

    const status = request();
    assert.equal('watcher' in status, false);
    assert.equal(status.idle, true);
  });
});

describe('attachIndexingProgress', () => {
  let store: StateStore | undefined;

  afterEach(() => {
    store?.dispose();
    store = undefined;
  });

  it('有任务时开始进度，全部完成后结束', async () => {
    store = new StateStore();
    const { connection, calls } = createProgressConnection();
    attachIndexingProgress(connection, store);

    store.openOrUpdateDocument('file:///ws/a.tf', 'provider "a" {}', 1);
    store.openOrUpdateDocument('file:///ws/b.tf', 'provider "b" {}', 1);
    await store.wait();
    await delay(0);

    assert.match(calls[0] ?? '', /^begin:Indexing workspace:\d+ jobs? remaining$/);
    assert.equal(calls[calls.length - 1], 'done');
    assert.equal(calls.filter(c => c.startsWith('begin')).length, 1);
    assert.equal(calls.filter(c => c === 'done').length, 1);
    assert.ok(calls.slice(1, -1).every(c => c.startsWith('report:')));
  });

  it('取消订阅后不再报告', async () => {
    store = new StateStore();
    const { connection, calls } = createProgressConnection();
    const detach = attachIndexingProgress(connection, store);
    detach();

    store.openOrUpdateDocument('file:///ws/a.tf', 'provider "a" {}', 1);
    await store.wait();
    await delay(0);

    assert.deepEqual(calls, []);
  });

  it('客户端拒绝创建进度时索引照常完成', async () => {
    store = new StateStore();
    const { connection, calls } = createProgressConnection(() => Promise.reject(new Error('not supported')));
    attachIndexingProgress(connection, store);

    store.openOrUpdateDocument('file:///ws/a.tf', 'provider "a" {}', 1);
    await store.wait();
    await delay(0);

    assert.deepEqual(calls, []);
    assert.equal(store.allSymbols().length, 1);
  });
});
