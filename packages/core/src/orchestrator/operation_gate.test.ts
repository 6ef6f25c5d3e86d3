import { OperationGate } from './operation_gate';
import { OperationInProgressError } from './orchestrator.errors';

describe('OperationGate', () => {
  it('should reject a second operation while one is in flight', async () => {
    const gate = new OperationGate();
    let release: () => void = () => undefined;
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });

    const running = gate.run('import', () => blocker);

    expect(gate.current()).toBe('import');
    await expect(gate.run('reconcile', async () => 'never')).rejects.toMatchObject({
      name: 'OperationInProgressError',
      requested: 'reconcile',
      inFlight: 'import',
      message: 'Cannot start reconcile: import is already in progress',
    });
    await expect(gate.run('import', async () => 'never')).rejects.toThrow(OperationInProgressError);

    release();
    await running;
    expect(gate.current()).toBeNull();
  });

  it('should release the gate when the operation fails', async () => {
    const gate = new OperationGate();

    await expect(gate.run('sync', async () => {
      throw new Error('git exploded');
    })).rejects.toThrow('git exploded');

    await expect(gate.run('sync', async () => 42)).resolves.toBe(42);
  });
});
