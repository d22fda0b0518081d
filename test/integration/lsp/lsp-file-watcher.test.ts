#!/usr/bin/env node
/**
 * 文件监控器测试
 * 验证 native 事件转发、polling 基线与变更检测、单飞行锁和目录排除
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { once } from 'node:events';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { FileWatcher, type FileWatcherConfig } from '../../../src/lsp/workspace/file-watcher.js';
import { StateStore } from '../../../src/lsp/workspace/state-store.js';
import { createTempWorkspace, fileUri, removeTempWorkspace, writeFiles } from '../../helpers/test-utils.js';

function names(store: StateStore): string[] {
  return store.allSymbols().map(entry => entry.symbol.name);
}

describe('FileWatcher', () => {
  let root: string;
  let store: StateStore;
  let watcher: FileWatcher | undefined;

  beforeEach(async () => {
    root = await createTempWorkspace();
    store = new StateStore();
  });

  afterEach(async () => {
    watcher?.stop();
    watcher = undefined;
    store.dispose();
    await removeTempWorkspace(root);
  });

  /**
   * 以 polling 模式启动并等待基线扫描完成
   */
  async function startPolling(config: Partial<FileWatcherConfig> = {}): Promise<FileWatcher> {
    const created = new FileWatcher(store, { mode: 'polling', pollingInterval: 60_000, ...config });
    watcher = created;
    const baseline = once(created.getEventEmitter(), 'scan:end');
    created.start([root]);
    assert.deepEqual(await baseline, [[]]);
    return created;
  }

  it('native 模式转发客户端事件', async () => {
    await writeFiles(root, { 'a.tf': 'provider "a" {}' });
    watcher = new FileWatcher(store, { mode: 'native' });
    watcher.start([root]);

    const accepted = watcher.handleNativeChanges([
      { uri: fileUri(join(root, 'a.tf')), type: 1 },
      { uri: fileUri(join(root, 'unknown.tf')), type: 3 },
      { uri: fileUri(join(root, 'a.tf')), type: 9 },
    ]);
    await store.wait();

    assert.equal(accepted, 1);
    assert.deepEqual(names(store), ['provider "a"']);
    assert.deepEqual(watcher.getStatus(), { enabled: true, mode: 'native', isRunning: true, trackedFiles: 0 });
  });

  it('native 删除事件移除文档', async () => {
    await writeFiles(root, { 'a.tf': 'provider "a" {}' });
    watcher = new FileWatcher(store, { mode: 'native' });
    watcher.handleNativeChanges([{ uri: fileUri(join(root, 'a.tf')), type: 1 }]);
    await store.wait();

    await fs.rm(join(root, 'a.tf'));
    assert.equal(watcher.handleNativeChanges([{ uri: fileUri(join(root, 'a.tf')), type: 3 }]), 1);
    await store.wait();

    assert.deepEqual(store.documents(), []);
  });

  it('polling 首次扫描只建立基线，之后检测新建、修改与删除', async () => {
    await writeFiles(root, { 'existing.tf': 'provider "old" {}' });
    const polling = await startPolling();
    assert.equal(polling.getStatus().trackedFiles, 1);

    const path = join(root, 'main.tf');
    await writeFiles(root, { 'main.tf': 'provider "a" {}' });
    assert.deepEqual(await polling.scan(), [{ uri: fileUri(path), type: 'created' }]);
    await store.wait();
    assert.deepEqual(names(store), ['provider "a"']);

    await fs.writeFile(path, 'provider "changed" {}', 'utf8');
    assert.deepEqual(await polling.scan(), [{ uri: fileUri(path), type: 'changed' }]);
    await store.wait();
    assert.deepEqual(names(store), ['provider "changed"']);

    await fs.rm(path);
    assert.deepEqual(await polling.scan(), [{ uri: fileUri(path), type: 'deleted' }]);
    await store.wait();
    assert.deepEqual(names(store), []);
    assert.equal(polling.getStatus().trackedFiles, 1);
  });

  it('并发扫描被单飞行锁拒绝', async () => {
    const polling = await startPolling();
    let rejected = 0;
    polling.getEventEmitter().on('scan:rejected', () => rejected++);

    const first = polling.scan();
    const second = polling.scan();

    assert.deepEqual(await second, []);
    await first;
    assert.equal(rejected, 1);
  });

  it('排除的目录不被扫描', async () => {
    const polling = await startPolling({ excludePatterns: ['vendor'] });

    await writeFiles(root, { 'vendor/lib.tf': 'provider "v" {}', 'main.tf': 'provider "m" {}' });

    assert.deepEqual(await polling.scan(), [{ uri: fileUri(join(root, 'main.tf')), type: 'created' }]);
  });

  it('禁用时 start 不启动监控', () => {
    watcher = new FileWatcher(store, { enabled: false, mode: 'polling' });
    watcher.start([root]);

    assert.deepEqual(watcher.getStatus(), { enabled: false, mode: 'polling', isRunning: false, trackedFiles: 0 });
  });
});
