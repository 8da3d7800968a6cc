import { StoreCommitFailure } from '../common/import-errors';
import { InventoryMutation } from '../inventory/inventory.types';
import { existingRecord, seededRepository } from '../testing/fixtures';
import { TransactionCommitterService } from './transaction-committer.service';

describe('TransactionCommitterService', () => {
  const update: InventoryMutation = {
    kind: 'update',
    rowNumber: 1,
    sku: 'EX-1',
    id: 'item-1',
    changes: { name: 'Renamed' },
  };

  it('does not call the store for an empty batch', async () => {
    const repository = seededRepository();
    const applyBatch = jest.spyOn(repository, 'applyBatch');

    await expect(new TransactionCommitterService(repository).commit([])).resolves.toEqual({
      created: 0,
      updated: 0,
    });
    expect(applyBatch).not.toHaveBeenCalled();
  });

  it('reports the store counts', async () => {
    const repository = seededRepository();

    await expect(new TransactionCommitterService(repository).commit([update])).resolves.toEqual({
      created: 0,
      updated: 1,
    });
    expect(repository.findBySku('EX-1')?.name).toBe('Renamed');
  });

  it('wraps store errors in a StoreCommitFailure', async () => {
    const repository = seededRepository();
    jest.spyOn(repository, 'applyBatch').mockRejectedValue(new Error('connection lost'));

    await expect(new TransactionCommitterService(repository).commit([update])).rejects.toEqual(
      new StoreCommitFailure('connection lost'),
    );
    expect(repository.findBySku('EX-1')).toEqual(existingRecord());
  });
});
