/**
 * Tests for the tree/knowledge base synchronizer.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { Synchronizer } from '../../../../src/core/sync/synchronizer.js';
import { QuestionTree } from '../../../../src/core/tree/tree.js';
import { QuestionAnswerKB } from '../../../../src/core/kb/knowledge-base.js';
import { SqliteVectorStore } from '../../../../src/core/kb/sqlite-store.js';
import { openDb } from '../../../../src/core/db/manager.js';
import { initializeTreeSchema, initializeVectorSchema } from '../../../../src/core/db/schema.js';
import { KeywordEmbedder } from '../../../fixtures/fakes.js';

describe('Synchronizer', () => {
  let treeDb: Database.Database;
  let vectorDb: Database.Database;
  let tree: QuestionTree;
  let kb: QuestionAnswerKB;
  let sync: Synchronizer;

  beforeEach(async () => {
    treeDb = openDb(':memory:', initializeTreeSchema);
    vectorDb = openDb(':memory:', initializeVectorSchema);
    tree = new QuestionTree(treeDb);
    const store = new SqliteVectorStore(vectorDb, new KeywordEmbedder(['goal', 'users']));
    kb = await QuestionAnswerKB.open(store, 'qa');
    sync = new Synchronizer(tree, kb);
  });

  afterEach(() => {
    treeDb.close();
    vectorDb.close();
  });

  describe('syncKbToTree', () => {
    it('should copy knowledge base answers into unanswered nodes', async () => {
      const goal = tree.addQuestion('What is the goal?');
      const users = tree.addQuestion('Who are the users?', goal);
      await kb.addTreeQuestion('What is the goal?', goal, 'Faster triage');
      await kb.addTreeQuestion('Who are the users?', users);

      const report = await sync.syncKbToTree();

      expect(report).toEqual({ direction: 'kb-to-tree', scanned: 2, updated: [goal], failures: [] });
      expect(tree.getQuestion(goal).answer).toBe('Faster triage');
      expect(tree.isAnswered(users)).toBe(false);
    });

    it('should never overwrite an answered node', async () => {
      const id = tree.addQuestion('What is the goal?');
      tree.updateAnswer(id, 'From the tree');
      await kb.addTreeQuestion('What is the goal?', id, 'From the KB');

      const report = await sync.syncKbToTree();

      expect(report.updated).toEqual([]);
      expect(tree.getQuestion(id).answer).toBe('From the tree');
    });

    it('should record unknown tree ids and keep going', async () => {
      const id = tree.addQuestion('What is the goal?');
      await kb.addTreeQuestion('Gone', 99, 'Orphaned answer');
      await kb.addTreeQuestion('What is the goal?', id, 'Kept going');

      const report = await sync.syncKbToTree();

      expect(report.failures).toEqual([{ treeId: 99, error: 'Question 99 not found' }]);
      expect(report.updated).toEqual([id]);
      expect(tree.getQuestion(id).answer).toBe('Kept going');
    });

    it('should take the first answer when several entries share a tree id', async () => {
      const id = tree.addQuestion('goal?');
      await kb.addQa(['goal?', 'aim?'], 'First', { tree_id: id, from_tree: true });
      await kb.addQa('purpose?', 'Second', { tree_id: id, from_tree: true });

      const report = await sync.syncKbToTree();

      expect(report.updated).toEqual([id]);
      expect(tree.getQuestion(id).answer).toBe('First');
    });

    it('should ignore untagged entries', async () => {
      tree.addQuestion('What is the goal?');
      await kb.addQa('What is the goal?', 'Untagged answer', { tree_id: 1 });

      const report = await sync.syncKbToTree();

      expect(report.scanned).toBe(0);
      expect(tree.isAnswered(1)).toBe(false);
    });
  });

  describe('syncTreeToKb', () => {
    it('should push tree answers to every tagged entry', async () => {
      const id = tree.addQuestion('goal?');
      await kb.addQa(['goal?', 'aim?'], null, { tree_id: id, from_tree: true });
      tree.updateAnswer(id, 'Ship it');

      const report = await sync.syncTreeToKb();

      expect(report).toEqual({ direction: 'tree-to-kb', scanned: 1, updated: [id], failures: [] });
      expect((await kb.getTreeQuestions()).map(e => e.answer)).toEqual(['Ship it', 'Ship it']);
    });

    it('should overwrite a differing knowledge base answer', async () => {
      const id = tree.addQuestion('goal?');
      await kb.addTreeQuestion('goal?', id, 'Old');
      tree.updateAnswer(id, 'New');

      await sync.syncTreeToKb();

      expect((await kb.getTreeQuestions())[0].answer).toBe('New');
    });

    it('should be idempotent', async () => {
      const a = tree.addQuestion('goal?');
      const b = tree.addQuestion('users?', a);
      await kb.addTreeQuestion('goal?', a);
      await kb.addTreeQuestion('users?', b);
      tree.updateAnswer(a, 'Ship it');
      tree.updateAnswer(b, 'Researchers');

      const first = await sync.syncTreeToKb();
      const afterFirst = await kb.getTreeQuestions();
      const second = await sync.syncTreeToKb();

      expect(first.updated).toEqual([a, b]);
      expect(second).toEqual({ direction: 'tree-to-kb', scanned: 2, updated: [], failures: [] });
      expect(await kb.getTreeQuestions()).toEqual(afterFirst);
    });

    it('should record answered nodes without entries and keep going', async () => {
      const missing = tree.addQuestion('never indexed');
      const indexed = tree.addQuestion('goal?');
      await kb.addTreeQuestion('goal?', indexed);
      tree.updateAnswer(missing, 'x');
      tree.updateAnswer(indexed, 'y');

      const report = await sync.syncTreeToKb();

      expect(report.failures).toEqual([
        { treeId: missing, error: `No knowledge base entry for tree question ${missing}` },
      ]);
      expect(report.updated).toEqual([indexed]);
    });

    it('should skip unanswered nodes', async () => {
      const id = tree.addQuestion('goal?');
      await kb.addTreeQuestion('goal?', id);

      const report = await sync.syncTreeToKb();

      expect(report.scanned).toBe(0);
      expect((await kb.getTreeQuestions())[0].answer).toBeNull();
    });
  });

  it('should converge after a round trip in both directions', async () => {
    const a = tree.addQuestion('goal?');
    const b = tree.addQuestion('users?', a);
    await kb.addTreeQuestion('goal?', a);
    await kb.addTreeQuestion('users?', b, 'Researchers');
    tree.updateAnswer(a, 'Ship it');

    await sync.syncKbToTree();
    await sync.syncTreeToKb();

    expect(tree.getAllQuestions().map(n => [n.id, n.answer])).toEqual([[a, 'Ship it'], [b, 'Researchers']]);
    expect((await kb.getTreeQuestions()).map(e => [e.treeId, e.answer])).toEqual([[a, 'Ship it'], [b, 'Researchers']]);
  });
});
