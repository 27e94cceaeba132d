import { MemoryMaintenanceFiles } from '../content/content.source';
import { silentLogger } from '../utils/logger';
import { MaintenanceRuntime } from './runtime';
import { clearMaintenanceRuntime, getMaintenanceRuntime, setMaintenanceRuntime } from './runtime.registry';

function createRuntime(): MaintenanceRuntime {
  return new MaintenanceRuntime({
    filename: 'maintenance.html',
    files: new MemoryMaintenanceFiles(),
    logger: silentLogger,
  });
}

describe('runtime registry', () => {
  afterEach(() => {
    clearMaintenanceRuntime();
  });

  it('returns the runtime it replaces', () => {
    const first = createRuntime();
    const second = createRuntime();

    expect(setMaintenanceRuntime(first)).toBeNull();
    expect(setMaintenanceRuntime(second)).toBe(first);
    expect(getMaintenanceRuntime()).toBe(second);
  });

  it('leaves a newer registration in place when an older owner clears', () => {
    const first = createRuntime();
    const second = createRuntime();
    setMaintenanceRuntime(first);
    setMaintenanceRuntime(second);

    expect(clearMaintenanceRuntime(first)).toBe(false);
    expect(getMaintenanceRuntime()).toBe(second);

    expect(clearMaintenanceRuntime(second)).toBe(true);
    expect(getMaintenanceRuntime()).toBeNull();
  });

  it('clears unconditionally without an owner', () => {
    setMaintenanceRuntime(createRuntime());

    expect(clearMaintenanceRuntime()).toBe(true);
    expect(getMaintenanceRuntime()).toBeNull();
  });
});
