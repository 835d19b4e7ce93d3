import { describe, it, expect, beforeEach } from 'vitest';
import type { Node } from '@arbor/protocol';
import { PermissionLevel } from '@arbor/protocol';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from '@arbor/repositories';
import { CapabilityScope, issueCapability } from '../access/capability.js';
import {
  CycleError,
  InvalidParentError,
  NotFoundError,
  ParentNotFoundError,
  PermissionDeniedError,
  ValidationError,
} from '../errors.js';
import { nativeIdentity } from '../identity/index.js';
import type { IdGenerator } from '../ids/index.js';
import { NodeStore } from './node-store.js';

// --- Test Fixtures ---

const owner = nativeIdentity('user-1');
const NOW = 1_700_000_000_000;

function sequentialIds(): IdGenerator {
  let counter = 0;
  return {
    next: () => String(++counter),
  };
}


async function collect(iterable: AsyncIterable<Node>): Promise<string[]> {
  const names: string[] = [];
  for await (const node of iterable) {
    names.push(node.name);
  }
  return names;
}

describe('NodeStore', () => {
  let repos: InMemoryRepositoryContext;
  let scope: CapabilityScope;
  let store: NodeStore;
  let workspace: Node;

  function cap(node: Node, level: PermissionLevel = PermissionLevel.Owner) {
    return issueCapability(scope, node, level, 'node.create');
  }

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    scope = new CapabilityScope(owner, { writable: true });
    store = new NodeStore(repos, sequentialIds(), scope, { pageSize: 2, now: () => NOW });
    workspace = await store.create({ type: 'workspace', name: 'Docs', parentId: null, ownerId: 'user-1' });
  });

  describe('create', () => {
    it('makes a workspace the root of its own tree', () => {
      expect(workspace).toMatchObject({ id: '1', type: 'workspace', parentId: null, workspaceId: '1' });
    });

    it('places children in their parent workspace', async () => {
      const category = await store.create(
        { type: 'category', name: '  Specs  ', parentId: workspace.id, ownerId: 'user-2' },
        cap(workspace)
      );

      expect(category).toMatchObject({
        id: '2',
        name: 'Specs',
        parentId: '1',
        workspaceId: '1',
        ownerId: 'user-2',
      });
    });

    it('rejects a workspace with a parent', async () => {
      await expect(
        store.create({ type: 'workspace', name: 'Nested', parentId: workspace.id, ownerId: 'user-1' })
      ).rejects.toBeInstanceOf(InvalidParentError);
    });

    it('rejects a non-workspace without a parent', async () => {
      await expect(
        store.create({ type: 'document', name: 'Orphan', parentId: null, ownerId: 'user-1' })
      ).rejects.toBeInstanceOf(InvalidParentError);
    });

    it('rejects a missing parent', async () => {
      const error = await store
        .create(
          { type: 'document', name: 'Lost', parentId: '999', ownerId: 'user-1' },
          cap({ ...workspace, id: '999' })
        )
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParentNotFoundError);
      expect(error).toBeInstanceOf(NotFoundError);
    });

    it('rejects a soft-deleted parent', async () => {
      const category = await store.create(
        { type: 'category', name: 'Old', parentId: workspace.id, ownerId: 'user-1' },
        cap(workspace)
      );
      await store.softDelete(category.id, cap(category));

      await expect(
        store.create({ type: 'document', name: 'New', parentId: category.id, ownerId: 'user-1' }, cap(category))
      ).rejects.toBeInstanceOf(InvalidParentError);
    });

    it('requires an Edit capability on the parent', async () => {
      const input = { type: 'document' as const, name: 'Note', parentId: workspace.id, ownerId: 'user-1' };

      await expect(store.create(input)).rejects.toBeInstanceOf(PermissionDeniedError);
      await expect(store.create(input, cap(workspace, PermissionLevel.Comment))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      await expect(store.create({ ...input, parentId: '999' }, cap(workspace))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      expect(repos._data.nodes.size).toBe(1);
    });

    it('rejects a capability from a read-only scope', async () => {
      const readScope = new CapabilityScope(owner, { writable: false });
      const readStore = new NodeStore(repos, sequentialIds(), readScope);
      const readCap = issueCapability(readScope, workspace, PermissionLevel.Owner, 'node.read');

      await expect(
        readStore.create({ type: 'document', name: 'Note', parentId: workspace.id, ownerId: 'user-1' }, readCap)
      ).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('rejects blank and overlong names', async () => {
      const blank = await store
        .create({ type: 'document', name: '   ', parentId: workspace.id, ownerId: 'user-1' }, cap(workspace))
        .catch((e: unknown) => e);

      expect(blank).toBeInstanceOf(ValidationError);
      expect(blank).toMatchObject({ field: 'name' });

      await expect(
        store.create(
          { type: 'document', name: 'x'.repeat(256), parentId: workspace.id, ownerId: 'user-1' },
          cap(workspace)
        )
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('get', () => {
    it('returns the node a Read capability covers', async () => {
      expect(await store.get(workspace.id, cap(workspace, PermissionLevel.Read))).toEqual(workspace);
    });

    it('throws NotFoundError for unknown ids', async () => {
      await expect(store.get('404', cap({ ...workspace, id: '404' }))).rejects.toBeInstanceOf(
        NotFoundError
      );
    });

    it('refuses a capability for another node', async () => {
      const other = await store.create({ type: 'workspace', name: 'Other', parentId: null, ownerId: 'user-2' });

      await expect(store.get(other.id, cap(workspace))).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('refuses capabilities issued in another scope or after the scope closed', async () => {
      const otherScope = new CapabilityScope(owner, { writable: true });
      const foreign = issueCapability(otherScope, workspace, PermissionLevel.Owner, 'node.read');
      await expect(store.get(workspace.id, foreign)).rejects.toBeInstanceOf(PermissionDeniedError);

      const own = cap(workspace);
      scope.close();
      await expect(store.get(workspace.id, own)).rejects.toBeInstanceOf(PermissionDeniedError);
    });
  });

  describe('rename', () => {
    it('rejects a capability issued for another node', async () => {
      const doc = await store.create(
        { type: 'document', name: 'Draft', parentId: workspace.id, ownerId: 'user-1' },
        cap(workspace)
      );

      await expect(store.rename(doc.id, 'Final', cap(workspace))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
      expect((await store.rename(doc.id, 'Final', cap(doc, PermissionLevel.Edit))).name).toBe('Final');
    });
  });

  describe('move', () => {
    let a: Node;
    let b: Node;

    beforeEach(async () => {
      a = await store.create({ type: 'category', name: 'A', parentId: workspace.id, ownerId: 'user-1' }, cap(workspace));
      b = await store.create({ type: 'category', name: 'B', parentId: workspace.id, ownerId: 'user-1' }, cap(workspace));
    });

    it('re-parents within the workspace', async () => {
      const moved = await store.move(b.id, a.id, cap(b), cap(a));
      expect(moved.parentId).toBe(a.id);
    });

    it('refuses to invert a move', async () => {
      await store.move(b.id, a.id, cap(b), cap(a));

      await expect(store.move(a.id, b.id, cap(a), cap(b))).rejects.toBeInstanceOf(CycleError);
      expect(repos._data.nodes.get(a.id)?.parentId).toBe(workspace.id);
    });

    it('refuses to move a node under itself', async () => {
      await expect(store.move(a.id, a.id, cap(a), cap(a))).rejects.toBeInstanceOf(CycleError);
    });

    it('refuses to move a workspace', async () => {
      await expect(store.move(workspace.id, a.id, cap(workspace), cap(a))).rejects.toBeInstanceOf(
        InvalidParentError
      );
    });

    it('refuses to leave the workspace', async () => {
      const other = await store.create({ type: 'workspace', name: 'Other', parentId: null, ownerId: 'user-1' });

      await expect(store.move(a.id, other.id, cap(a), cap(other))).rejects.toBeInstanceOf(InvalidParentError);
    });

    it('refuses a soft-deleted destination', async () => {
      await store.softDelete(a.id, cap(a));

      await expect(store.move(b.id, a.id, cap(b), cap(a))).rejects.toBeInstanceOf(InvalidParentError);
    });

    it('needs Edit on the destination', async () => {
      await expect(store.move(b.id, a.id, cap(b), cap(a, PermissionLevel.Read))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });
  });

  describe('softDelete and restore', () => {
    it('keeps the parent links of children', async () => {
      const category = await store.create(
        { type: 'category', name: 'C', parentId: workspace.id, ownerId: 'user-1' },
        cap(workspace)
      );
      const doc = await store.create(
        { type: 'document', name: 'D', parentId: category.id, ownerId: 'user-1' },
        cap(category)
      );

      const deleted = await store.softDelete(category.id, cap(category));
      expect(deleted.deletedAt).toBe('2023-11-14T22:13:20.000Z');
      expect((await store.get(doc.id, cap(doc))).parentId).toBe(category.id);

      const again = await store.softDelete(category.id, cap(category));
      expect(again.deletedAt).toBe(deleted.deletedAt);

      const restored = await store.restore(category.id, cap(category));
      expect(restored.deletedAt).toBeUndefined();
    });

    it('requires Owner', async () => {
      await expect(store.softDelete(workspace.id, cap(workspace, PermissionLevel.Edit))).rejects.toBeInstanceOf(
        PermissionDeniedError
      );
    });
  });

  describe('listChildren', () => {
    it('pages through children in id order and skips deleted ones', async () => {
      const created: Node[] = [];
      for (const name of ['one', 'two', 'three', 'four', 'five']) {
        created.push(
          await store.create({ type: 'document', name, parentId: workspace.id, ownerId: 'user-1' }, cap(workspace))
        );
      }
      await store.softDelete(created[2].id, cap(created[2]));

      expect(await collect(store.listChildren(workspace.id, cap(workspace)))).toEqual([
        'one',
        'two',
        'four',
        'five',
      ]);
      expect(
        await collect(store.listChildren(workspace.id, cap(workspace), { includeDeleted: true }))
      ).toEqual([
        'one',
        'two',
        'three',
        'four',
        'five',
      ]);
    });

    it('needs Owner to include deleted children', async () => {
      const children = store.listChildren(workspace.id, cap(workspace, PermissionLevel.Edit), {
        includeDeleted: true,
      });

      await expect(collect(children)).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('stops yielding once the scope closes', async () => {
      const children = store.listChildren(workspace.id, cap(workspace, PermissionLevel.Read));
      expect(await collect(children)).toEqual([]);

      scope.close();
      await expect(collect(children)).rejects.toBeInstanceOf(PermissionDeniedError);
    });

    it('reflects the current tree on each iteration', async () => {
      const children = store.listChildren(workspace.id, cap(workspace));
      expect(await collect(children)).toEqual([]);

      await store.create({ type: 'document', name: 'late', parentId: workspace.id, ownerId: 'user-1' }, cap(workspace));
      expect(await collect(children)).toEqual(['late']);
    });
  });
});
