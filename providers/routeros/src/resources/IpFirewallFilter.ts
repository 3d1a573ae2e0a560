import { ResourceSchema } from '@netform/contracts';
import {
  KeyPlaceBefore,
  PropCommentRw,
  PropDisabledRw,
  PropDynamicRo,
  PropInvalidRo,
  PropPlaceBefore,
  stringInSlice,
  validationIpAddress,
} from '@netform/schema';

export const IpFirewallFilter: ResourceSchema = {
  name: 'ip_firewall_filter',
  path: '/ip/firewall/filter',
  idType: 'id',
  ordering: { field: KeyPlaceBefore, strategy: 'move' },
  fields: {
    chain: { type: 'string', required: true, description: 'Chain the rule belongs to (input, forward, output or a custom one).' },
    action: {
      type: 'string',
      optional: true,
      default: 'accept',
      validate: stringInSlice(['accept', 'add-dst-to-address-list', 'add-src-to-address-list', 'drop', 'fasttrack-connection', 'jump', 'log', 'passthrough', 'reject', 'return', 'tarpit']),
    },
    protocol: { type: 'string', optional: true },
    src_address: { type: 'string', optional: true, validate: validationIpAddress },
    dst_address: { type: 'string', optional: true, validate: validationIpAddress },
    dst_port: { type: 'string', optional: true },
    in_interface: { type: 'string', optional: true },
    out_interface: { type: 'string', optional: true },
    connection_state: {
      type: 'list',
      optional: true,
      validate: (value) =>
        Array.isArray(value) && value.every((state) => ['established', 'related', 'new', 'invalid', 'untracked'].includes(state.replace(/^!/, '')))
          ? undefined
          : `unexpected connection state in ${JSON.stringify(value)}`,
    },
    jump_target: { type: 'string', optional: true },
    log: { type: 'bool', optional: true },
    log_prefix: { type: 'string', optional: true },
    comment: PropCommentRw,
    disabled: PropDisabledRw,
    place_before: PropPlaceBefore,
    dynamic: PropDynamicRo,
    invalid: PropInvalidRo,
    // Counters outgrow a safe integer
    bytes: { type: 'string', computed: true },
    packets: { type: 'string', computed: true },
  },
};
