import { DecodeError, naturalKey, NotFoundError, opaqueId, TransportError, ValidationError } from '@netform/contracts';
import { MemoryTransport } from '@netform/transport';
import { beforeEach, describe, expect, it } from 'vitest';

import { ResourceEngine } from '../src/ResourceEngine';
import { createDevice, filterRules, scheduler } from './fixtures';

describe('ResourceEngine', () => {
  let device: MemoryTransport;
  let engine: ResourceEngine;

  beforeEach(() => {
    device = createDevice();
    engine = new ResourceEngine(scheduler, device);
  });

  describe('create', () => {
    it('should create and return computed fields from the response', async () => {
      const resource = await engine.create({ name: 'sched1', on_event: 'myscript', interval: '1h' });

      expect(resource.identity).toEqual(naturalKey('sched1'));
      expect(resource.instance).toEqual({
        name: 'sched1',
        on_event: 'myscript',
        interval: '1h',
        disabled: false,
        run_count: '0',
        next_run: 'jan/02/2026 00:00:00',
      });
      expect(device.snapshot('/system/scheduler')).toEqual([
        {
          '.id': '*1',
          name: 'sched1',
          'on-event': 'myscript',
          interval: '3600s',
          disabled: 'false',
          'run-count': '0',
          'next-run': 'jan/02/2026 00:00:00',
        },
      ]);
    });

    it('should re-read by id when the response has no computed fields', async () => {
      const rules = new ResourceEngine(filterRules('move'), device);

      const resource = await rules.create({ chain: 'input', action: 'accept' });

      expect(resource.identity).toEqual(opaqueId('*1'));
      expect(device.requests.map((r) => r.operation)).toEqual(['add', 'read']);
      expect(device.requests[1].filters).toEqual([{ field: '.id', value: '*1' }]);
    });

    it('should reject invalid instances before any remote call', async () => {
      await expect(engine.create({ name: 'sched1', interval: 'soon' })).rejects.toThrow(ValidationError);
      await expect(engine.create({ on_event: 'myscript' })).rejects.toThrow('system_scheduler field "name": required field is missing');
      await expect(engine.create({ name: 'sched1', run_count: '5' })).rejects.toThrow('computed field cannot be set');

      expect(device.requests).toHaveLength(0);
    });

    it('should annotate transport failures', async () => {
      device.failNext('add', 'failure: out of memory');

      const error = await engine.create({ name: 'sched1' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('message', 'add system_scheduler: failure: out of memory');
      expect(error).toHaveProperty('cause.message', 'failure: out of memory');
    });

    it('should record the name the device assigns', async () => {
      const vlanDevice = new MemoryTransport({ '/interface/vlan': { onAdd: (record) => ({ name: 'vlan1', ...record }) } });
      const vlans = new ResourceEngine(
        {
          name: 'interface_vlan',
          path: '/interface/vlan',
          idType: 'name',
          fields: { name: { type: 'string', optional: true, computed: true }, vlan_id: { type: 'int', required: true } },
        },
        vlanDevice
      );

      const first = await vlans.reconcile({ vlan_id: 10 });
      const second = await vlans.reconcile({ vlan_id: 10 }, first.resource.identity);

      expect(first.resource.identity).toEqual(naturalKey('vlan1'));
      expect(second.actions.map((a) => a.type)).toEqual(['NO_OP']);
      expect(vlanDevice.snapshot('/interface/vlan')).toHaveLength(1);
    });
  });

  describe('read', () => {
    it('should decode the device record', async () => {
      await engine.create({ name: 'sched1', on_event: 'myscript', interval: '1h' });

      const resource = await engine.read(naturalKey('sched1'));

      expect(resource.instance.interval).toBe('3600s');
      expect(resource.instance.run_count).toBe('0');
      expect(resource.instance.disabled).toBe(false);
    });

    it('should raise NotFoundError after delete', async () => {
      await engine.create({ name: 'sched1' });
      await engine.delete(naturalKey('sched1'));

      await expect(engine.read(naturalKey('sched1'))).rejects.toThrow(NotFoundError);
      expect(device.snapshot('/system/scheduler')).toEqual([]);
    });

    it('should raise DecodeError for values that do not parse', async () => {
      device.seed('/system/scheduler', [{ name: 'broken', disabled: 'maybe' }]);

      await expect(engine.read(naturalKey('broken'))).rejects.toThrow('system_scheduler field "disabled": cannot parse "maybe" as boolean');
    });

    it('should pass extra filters to the device', async () => {
      device.seed('/system/scheduler', [{ name: 'sched1', disabled: 'true' }]);

      await expect(engine.read(naturalKey('sched1'), [{ field: 'disabled', value: 'false' }])).rejects.toThrow(NotFoundError);
    });
  });

  describe('update', () => {
    it('should send only changed fields', async () => {
      await engine.create({ name: 'sched1', on_event: 'myscript', interval: '1h' });

      const resource = await engine.update(naturalKey('sched1'), { name: 'sched1', on_event: 'other', interval: '60m' });

      const set = device.requests.find((r) => r.operation === 'set');
      expect(set?.params).toEqual({ '.id': '*1', 'on-event': 'other' });
      expect(resource.instance.on_event).toBe('other');
    });

    it('should translate "no such item" into NotFoundError', async () => {
      await engine.create({ name: 'sched1' });
      device.failNext('set', 'no such item');

      const error = await engine.update(naturalKey('sched1'), { name: 'sched1', on_event: 'x' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', 'set system_scheduler [*1]: no such item');
    });

    it('should reject invalid instances and read failures as part of the update call', async () => {
      await engine.create({ name: 'sched1' });
      await expect(engine.update(naturalKey('sched1'), { name: 'sched1', interval: 'soon' })).rejects.toThrow(ValidationError);
      device.failNext('read', 'failure: timeout');

      const error = await engine.update(naturalKey('sched1'), { name: 'sched1', on_event: 'x' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('message', 'read system_scheduler [name=sched1]: failure: timeout');
      expect(device.requests.filter((r) => r.operation === 'set')).toHaveLength(0);
    });
  });

  describe('reconcile', () => {
    it('should be idempotent', async () => {
      const desired = { name: 'sched1', on_event: 'myscript', interval: '1h' };
      const first = await engine.reconcile(desired);

      const second = await engine.reconcile(desired, first.resource.identity);

      expect(first.actions.map((a) => a.type)).toEqual(['CREATE']);
      expect(second.actions).toEqual([{ type: 'NO_OP', kind: 'system_scheduler', identity: opaqueId('*1') }]);
      expect(device.requests.filter((r) => r.operation !== 'read')).toHaveLength(1);
    });

    it('should converge after an update', async () => {
      const { resource } = await engine.reconcile({ name: 'sched1', interval: '1h' });

      const changed = await engine.reconcile({ name: 'sched1', interval: '2h' }, resource.identity);
      const again = await engine.reconcile({ name: 'sched1', interval: '2h' }, resource.identity);

      expect(changed.actions.map((a) => a.type)).toEqual(['UPDATE']);
      expect(changed.resource.instance.interval).toBe('7200s');
      expect(again.actions.map((a) => a.type)).toEqual(['NO_OP']);
    });

    it('should recreate an instance removed out-of-band', async () => {
      const { resource } = await engine.reconcile({ name: 'sched1' });
      await device.execute({ operation: 'remove', path: '/system/scheduler', params: { '.id': '*1' }, filters: [] });

      const result = await engine.reconcile({ name: 'sched1' }, resource.identity);

      expect(result.actions.map((a) => a.type)).toEqual(['CREATE']);
      expect(device.snapshot('/system/scheduler').map((r) => r['.id'])).toEqual(['*2']);
    });

    it('should move a rule that is out of place', async () => {
      const rules = new ResourceEngine(filterRules('move'), device);
      device.seed('/ip/firewall/filter', [
        { chain: 'input', action: 'accept' },
        { chain: 'input', action: 'accept' },
        { chain: 'input', action: 'drop' },
      ]);

      const moved = await rules.reconcile({ chain: 'input', action: 'drop', place_before: '*1' }, opaqueId('*3'));
      const again = await rules.reconcile({ chain: 'input', action: 'drop', place_before: '*1' }, opaqueId('*3'));

      expect(moved.actions).toEqual([{ type: 'MOVE', kind: 'ip_firewall_filter', identity: opaqueId('*3'), destination: '*1' }]);
      expect(device.snapshot('/ip/firewall/filter').map((r) => r['.id'])).toEqual(['*3', '*1', '*2']);
      expect(again.actions.map((a) => a.type)).toEqual(['NO_OP']);
    });

    it('should recreate a rule that is out of place when the kind cannot move', async () => {
      const rules = new ResourceEngine(filterRules('recreate'), device);
      device.seed('/ip/firewall/nat', [
        { chain: 'srcnat', action: 'masquerade' },
        { chain: 'srcnat', action: 'accept' },
        { chain: 'srcnat', action: 'drop' },
      ]);

      const result = await rules.reconcile({ chain: 'srcnat', action: 'drop', place_before: '*1' }, opaqueId('*3'));

      expect(result.actions.map((a) => a.type)).toEqual(['DELETE', 'CREATE']);
      expect(result.resource.identity).toEqual(opaqueId('*4'));
      expect(device.snapshot('/ip/firewall/nat').map((r) => r['.id'])).toEqual(['*4', '*1', '*2']);
    });
  });

  describe('plan', () => {
    it('should plan a create with defaults when nothing is observed', async () => {
      const actions = await engine.plan({ name: 'sched1', interval: '1h' });

      expect(actions).toEqual([
        { type: 'CREATE', kind: 'system_scheduler', params: { name: 'sched1', interval: '1h', disabled: 'false' } },
      ]);
      expect(device.requests).toHaveLength(0);
    });

    it('should only read from the device', async () => {
      await engine.create({ name: 'sched1', interval: '1h' });
      device.requests.length = 0;

      const actions = await engine.plan({ name: 'sched1', interval: '30m' }, naturalKey('sched1'));

      expect(actions.map((a) => a.type)).toEqual(['UPDATE']);
      expect(actions[0].changes).toEqual({ interval: { old: '3600s', new: '30m' } });
      expect(device.requests.every((r) => r.operation === 'read')).toBe(true);
    });

    it('should surface DecodeError for unparsable device state', async () => {
      device.seed('/system/scheduler', [{ name: 'sched1', disabled: 'maybe' }]);

      await expect(engine.plan({ name: 'sched1' }, naturalKey('sched1'))).rejects.toThrow(DecodeError);
    });
  });
});
