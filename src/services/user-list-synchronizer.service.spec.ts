import { Test, TestingModule } from '@nestjs/testing';
import { Logger } from '@nestjs/common';
import { UserListSynchronizerService } from './user-list-synchronizer.service';
import { ParameterStoreClientService } from './parameter-store-client.service';
import { InMemoryParameterStore } from './__fixtures__/in-memory-parameter-store';
import { TransientStoreError } from '../errors/ssh-users.errors';

describe('UserListSynchronizerService', () => {
  const region = 'us-east-1';
  const name = '/ssh/users';

  let service: UserListSynchronizerService;
  let store: InMemoryParameterStore;
  let loggerWarnSpy: jest.SpyInstance;
  let loggerDebugSpy: jest.SpyInstance;

  beforeEach(async () => {
    store = new InMemoryParameterStore();
    loggerWarnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation();
    loggerDebugSpy = jest.spyOn(Logger.prototype, 'debug').mockImplementation();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        UserListSynchronizerService,
        { provide: ParameterStoreClientService, useValue: store },
      ],
    }).compile();

    service = module.get<UserListSynchronizerService>(UserListSynchronizerService);
  });

  afterEach(() => {
    loggerWarnSpy.mockRestore();
    loggerDebugSpy.mockRestore();
  });

  describe('read', () => {
    it('should return the stored users sorted', async () => {
      store.seed(region, name, 'carol,alice, bob');

      await expect(service.read(region, name)).resolves.toEqual({
        region,
        parameterName: name,
        exists: true,
        users: ['alice', 'bob', 'carol'],
      });
    });

    it('should read a missing parameter as an empty list', async () => {
      await expect(service.read(region, name)).resolves.toEqual({
        region,
        parameterName: name,
        exists: false,
        users: [],
      });
      expect(loggerWarnSpy).toHaveBeenCalledWith(
        "The user list parameter '/ssh/users' does not exist in region 'us-east-1'.",
      );
    });

    it('should propagate other store errors', async () => {
      store.failOn('GetParameter', region, TransientStoreError);

      await expect(service.read(region, name)).rejects.toBeInstanceOf(TransientStoreError);
    });
  });

  describe('synchronize', () => {
    it('should write once when a user is replaced', async () => {
      store.seed(region, name, 'alice,bob');

      const result = await service.synchronize(region, name, new Set(['alice', 'carol']));

      expect(result).toEqual({
        region,
        parameterName: name,
        status: 'updated',
        added: ['carol'],
        removed: ['bob'],
        users: ['alice', 'carol'],
      });
      expect(store.value(region, name)).toBe('alice,carol');
      expect(store.writes()).toHaveLength(1);
    });

    it('should not write when only the order differs', async () => {
      store.seed(region, name, 'alice,bob');

      const result = await service.synchronize(region, name, new Set(['bob', 'alice']));

      expect(result.status).toBe('unchanged');
      expect(store.writes()).toHaveLength(0);
      expect(store.value(region, name)).toBe('alice,bob');
    });

    it.each([['alice,alice, ,bob'], [' bob , alice'], ['alice,,bob'], ['bob,alice,bob']])(
      'should rewrite %p once in clean form',
      async (stored) => {
        store.seed(region, name, stored);

        const first = await service.synchronize(region, name, new Set(['alice', 'bob']));
        const second = await service.synchronize(region, name, new Set(['alice', 'bob']));

        expect(first).toMatchObject({ status: 'updated', added: [], removed: [] });
        expect(second.status).toBe('unchanged');
        expect(store.value(region, name)).toBe('alice,bob');
        expect(store.writes()).toHaveLength(1);
      },
    );

    it('should delete a stored value holding only blank entries when no users are wanted', async () => {
      store.seed(region, name, ' , ');

      const result = await service.synchronize(region, name, new Set());

      expect(result.status).toBe('deleted');
      expect(store.value(region, name)).toBeUndefined();
    });

    it('should create the parameter when it does not exist', async () => {
      const result = await service.synchronize(region, name, new Set(['alice']));

      expect(result.status).toBe('created');
      expect(result.added).toEqual(['alice']);
      expect(store.value(region, name)).toBe('alice');
    });

    it('should write only once when run twice with the same users', async () => {
      const desired = new Set(['bob', 'alice']);

      const first = await service.synchronize(region, name, desired);
      const second = await service.synchronize(region, name, desired);

      expect(first.status).toBe('created');
      expect(second.status).toBe('unchanged');
      expect(store.writes()).toHaveLength(1);
      expect(store.value(region, name)).toBe('alice,bob');
    });

    it('should delete the parameter when no users are left', async () => {
      store.seed(region, name, 'alice');

      const result = await service.synchronize(region, name, new Set());

      expect(result.status).toBe('deleted');
      expect(result.removed).toEqual(['alice']);
      expect(store.value(region, name)).toBeUndefined();
      expect(store.writes()).toEqual([
        { operation: 'DeleteParameter', region, name },
      ]);
    });

    it('should leave a missing parameter alone when no users are wanted', async () => {
      const result = await service.synchronize(region, name, new Set());

      expect(result.status).toBe('unchanged');
      expect(store.writes()).toHaveLength(0);
    });

    it('should propagate a failed write', async () => {
      store.seed(region, name, 'alice').failOn('PutParameter', region, TransientStoreError);

      await expect(
        service.synchronize(region, name, new Set(['bob'])),
      ).rejects.toBeInstanceOf(TransientStoreError);
      expect(store.value(region, name)).toBe('alice');
    });
  });

  describe('reconcile', () => {
    it('should apply the change to the stored users', async () => {
      store.seed(region, name, 'alice');

      const result = await service.reconcile(
        region,
        name,
        (current) => new Set([...current, 'bob']),
      );

      expect(result.status).toBe('updated');
      expect(store.value(region, name)).toBe('alice,bob');
    });

    it('should start from an empty set for a missing parameter', async () => {
      const change = jest.fn((current: ReadonlySet<string>) => new Set(current));

      await service.reconcile(region, name, change);

      expect(change).toHaveBeenCalledWith(new Set());
    });
  });
});
