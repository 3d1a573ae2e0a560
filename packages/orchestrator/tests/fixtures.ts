import { parseDuration } from '@netform/codec';
import { ResourceSchema } from '@netform/contracts';
import { EngineProvider } from '@netform/engine';
import { PropDisabledRw, PropNameRw, PropPlaceBefore, SchemaRegistry, timeEqual } from '@netform/schema';
import { MemoryTransport } from '@netform/transport';

const scheduler: ResourceSchema = {
  name: 'system_scheduler',
  path: '/system/scheduler',
  idType: 'name',
  fields: {
    name: PropNameRw,
    on_event: { type: 'string', optional: true },
    interval: { type: 'string', format: 'duration', optional: true, suppressDiff: timeEqual },
    disabled: PropDisabledRw,
    run_count: { type: 'string', computed: true },
  },
};

const filterRules: ResourceSchema = {
  name: 'ip_firewall_filter',
  path: '/ip/firewall/filter',
  idType: 'id',
  ordering: { field: 'place_before', strategy: 'move' },
  fields: {
    chain: { type: 'string', required: true },
    action: { type: 'string', optional: true },
    comment: { type: 'string', optional: true },
    place_before: PropPlaceBefore,
  },
};

export function createProvider(): { device: MemoryTransport; provider: EngineProvider } {
  const device = new MemoryTransport({
    '/system/scheduler': {
      onAdd: (record) => ({ ...record, 'run-count': '0' }),
      normalize: (record) => {
        const seconds = record.interval === undefined ? undefined : parseDuration(record.interval);
        return seconds === undefined ? record : { ...record, interval: `${seconds}s` };
      },
    },
  });

  return { device, provider: new EngineProvider(SchemaRegistry.build([scheduler, filterRules]), device) };
}
