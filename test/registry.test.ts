import { describe, expect, it } from 'vitest';

import { NotFoundError } from '../src/errors.js';
import { ScanResponsePackSchema } from '../src/messages.js';
import { DeviceRegistry } from '../src/registry.js';
import type { ScanResult } from '../src/types.js';

function result(mac: string, address: string): ScanResult {
  return { address, metadata: ScanResponsePackSchema.parse({ t: 'dev', mac, name: mac }) };
}

describe('DeviceRegistry', () => {
  it('replaces every device on a scan', () => {
    const registry = new DeviceRegistry();
    registry.recordScan([result('aa01', '10.0.0.1'), result('aa02', '10.0.0.2')], 100);
    registry.recordScan([result('aa02', '10.0.0.5')], 200);

    expect(registry.size).toBe(1);
    expect(registry.find('aa01')).toBeUndefined();
    expect(registry.get('aa02')).toMatchObject({ mac: 'aa02', address: '10.0.0.5', scannedAt: 200 });
  });

  it('drops session keys on rescan by default', () => {
    const registry = new DeviceRegistry();
    registry.recordScan([result('aa01', '10.0.0.1')], 100);
    registry.recordBind('aa01', 'test-secret-0001', 150);
    expect(registry.get('aa01').key).toBe('test-secret-0001');

    registry.recordScan([result('aa01', '10.0.0.1')], 200);

    expect(registry.get('aa01').key).toBeUndefined();
    expect(registry.get('aa01').boundAt).toBeUndefined();
  });

  it('carries session keys forward when asked to', () => {
    const registry = new DeviceRegistry({}, { retainSessionKeys: true });
    registry.recordScan([result('aa01', '10.0.0.1')], 100);
    registry.recordBind('aa01', 'test-secret-0001', 150);

    registry.recordScan([result('aa01', '10.0.0.9')], 200);

    expect(registry.get('aa01')).toMatchObject({ address: '10.0.0.9', key: 'test-secret-0001', boundAt: 150, scannedAt: 200 });
  });

  it('resolves aliases and passes anything else through', () => {
    const registry = new DeviceRegistry({ lounge: 'aa01' });
    expect(registry.resolve('lounge')).toBe('aa01');
    expect(registry.resolve('aa07')).toBe('aa07');
  });

  it('raises NotFound for unknown devices', () => {
    const registry = new DeviceRegistry();
    expect(() => registry.get('aa01')).toThrow(NotFoundError);
    expect(() => registry.recordBind('aa01', 'test-secret-0001')).toThrow('Device not found: aa01');
  });

  it('edits aliases', () => {
    const registry = new DeviceRegistry({ lounge: 'aa01' });
    registry.setAlias('den', 'aa01');
    registry.setAlias('attic', 'aa02');

    expect(registry.aliasesOf('aa01')).toEqual(['lounge', 'den']);
    expect(registry.removeAlias('lounge')).toBe(true);
    expect(registry.removeAlias('lounge')).toBe(false);
    expect(registry.resolve('lounge')).toBe('lounge');
  });

  it('lists devices in scan order', () => {
    const registry = new DeviceRegistry();
    registry.recordScan([result('aa02', '10.0.0.2'), result('aa01', '10.0.0.1')]);
    expect(registry.list().map(d => d.mac)).toEqual(['aa02', 'aa01']);
  });
});
