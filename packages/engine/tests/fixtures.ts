import { parseDuration } from '@netform/codec';
import { DeviceRecord, ResourceSchema } from '@netform/contracts';
import { PropDisabledRw, PropNameRw, PropPlaceBefore, timeEqual, validationTime } from '@netform/schema';
import { MemoryTransport } from '@netform/transport';

export const scheduler: ResourceSchema = {
  name: 'system_scheduler',
  path: '/system/scheduler',
  idType: 'name',
  fields: {
    name: PropNameRw,
    on_event: { type: 'string', optional: true },
    interval: { type: 'string', format: 'duration', optional: true, validate: validationTime, suppressDiff: timeEqual },
    disabled: PropDisabledRw,
    run_count: { type: 'string', computed: true },
    next_run: { type: 'string', computed: true },
  },
};

export function filterRules(strategy: 'move' | 'recreate'): ResourceSchema {
  return {
    name: strategy === 'move' ? 'ip_firewall_filter' : 'ip_firewall_nat',
    path: strategy === 'move' ? '/ip/firewall/filter' : '/ip/firewall/nat',
    idType: 'id',
    ordering: { field: 'place_before', strategy },
    fields: {
      chain: { type: 'string', required: true },
      action: { type: 'string', optional: true },
      comment: { type: 'string', optional: true },
      place_before: PropPlaceBefore,
    },
  };
}

/** Prints intervals back in seconds, the way the device does */
function secondsInterval(record: DeviceRecord): DeviceRecord {
  const seconds = record.interval === undefined ? undefined : parseDuration(record.interval);
  return seconds === undefined ? record : { ...record, interval: `${seconds}s` };
}

export function createDevice(): MemoryTransport {
  return new MemoryTransport({
    '/system/scheduler': {
      onAdd: (record) => ({ ...record, 'run-count': '0', 'next-run': 'jan/02/2026 00:00:00' }),
      normalize: secondsInterval,
    },
  });
}
