#!/usr/bin/env node

// Language server entry: indexing core wired to an LSP connection over stdio/IPC

import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  DidChangeWatchedFilesNotification,
  TextDocumentSyncKind,
  type InitializeParams,
  type InitializeResult,
} from 'vscode-languageserver/node.js';
import { TextDocument } from 'vscode-languageserver-textdocument';

import { createLogger } from '../utils/logger.js';
import { toError } from './errors.js';
import { attachIndexingProgress, registerIndexStatusHandlers } from './health.js';
import { registerSymbolsHandlers } from './symbols.js';
import { uriToFsPath } from './utils.js';
import { FileWatcher } from './workspace/file-watcher.js';
import { StateStore } from './workspace/state-store.js';

const logger = createLogger('server');

// Create a connection for the server, using Node's IPC as a transport.
const connection = createConnection(ProposedFeatures.all);

// Create a simple text document manager.
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

const store = new StateStore();
const watcher = new FileWatcher(store);
const workspaceFolders: string[] = [];

let hasWatchedFilesCapability = false;
let hasWorkDoneProgressCapability = false;
let detachProgress: (() => void) | undefined;

connection.onInitialize((params: InitializeParams): InitializeResult => {
  const capabilities = params.capabilities;
  hasWatchedFilesCapability = capabilities.workspace?.didChangeWatchedFiles?.dynamicRegistration === true;
  hasWorkDoneProgressCapability = capabilities.window?.workDoneProgress === true;

  if (Array.isArray(params.workspaceFolders) && params.workspaceFolders.length > 0) {
    for (const folder of params.workspaceFolders) {
      const fsPath = uriToFsPath(folder.uri);
      if (fsPath) workspaceFolders.push(fsPath);
    }
  }
  // Fallback: rootUri when the client sends no workspace folders
  if (workspaceFolders.length === 0 && params.rootUri) {
    const rootFsPath = uriToFsPath(params.rootUri);
    if (rootFsPath) workspaceFolders.push(rootFsPath);
  }

  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      workspaceSymbolProvider: true,
    },
  };
});

connection.onInitialized(() => {
  if (hasWorkDoneProgressCapability) {
    detachProgress = attachIndexingProgress(connection, store);
  }

  // Respond to external file changes if client supports it
  if (hasWatchedFilesCapability) {
    watcher.configure({ mode: 'native', enabled: true });
    connection.client
      .register(DidChangeWatchedFilesNotification.type, {
        watchers: [{ globPattern: '**/*.{tf,tofu,tfvars}' }],
      })
      .catch((error: unknown) => {
        logger.warn('Failed to register file watchers', { error: toError(error).message });
      });
  } else {
    logger.warn('Client does not advertise didChangeWatchedFiles; falling back to polling mode');
    watcher.configure({ mode: 'polling', enabled: true });
  }
  watcher.start(workspaceFolders);

  for (const folder of workspaceFolders) {
    store.walkWorkspace(folder);
  }
  logger.info('Workspace indexing started', { roots: workspaceFolders });

  registerIndexStatusHandlers(connection, store, () => watcher.getStatus());
  registerSymbolsHandlers(connection, store);
});

connection.onDidChangeWatchedFiles(ev => {
  watcher.handleNativeChanges(ev.changes);
});

// Fires on open and on every edit
documents.onDidChangeContent(change => {
  const { document } = change;
  // untitled: and other non-file schemes are not indexed
  if (uriToFsPath(document.uri) === null) return;
  store.openOrUpdateDocument(document.uri, document.getText(), document.version);
});

documents.onDidClose(e => {
  if (uriToFsPath(e.document.uri) === null) return;
  store.closeDocument(e.document.uri);
});

// Make the text document manager listen on the connection
// for open, change and close text document events
documents.listen(connection);

connection.onExit(() => {
  detachProgress?.();
  watcher.stop();
  store.dispose();
});

// Listen on the connection
connection.listen();
