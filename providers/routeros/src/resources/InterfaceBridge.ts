import { ResourceSchema } from '@netform/contracts';
import {
  hexEqual,
  PropActualMtuRo,
  PropArpRw,
  PropArpTimeoutRw,
  PropCommentRw,
  PropDisabledRw,
  PropL2MtuRo,
  PropMtuRw,
  PropNameRw,
  PropRunningRo,
  stringInSlice,
  timeEqual,
  validationTime,
} from '@netform/schema';

export const InterfaceBridge: ResourceSchema = {
  name: 'interface_bridge',
  path: '/interface/bridge',
  idType: 'name',
  fields: {
    name: PropNameRw,
    mtu: PropMtuRw(),
    arp: PropArpRw,
    arp_timeout: PropArpTimeoutRw,
    ageing_time: {
      type: 'string',
      format: 'duration',
      optional: true,
      default: '5m',
      validate: validationTime,
      suppressDiff: timeEqual,
      description: 'How long a host is kept in the host table after its last packet.',
    },
    protocol_mode: { type: 'string', optional: true, default: 'rstp', validate: stringInSlice(['none', 'rstp', 'stp', 'mstp']) },
    priority: {
      type: 'string',
      format: 'hex',
      optional: true,
      default: '0x8000',
      suppressDiff: hexEqual,
      description: 'Bridge priority, used by (R/M)STP to elect the root bridge.',
    },
    vlan_filtering: { type: 'bool', optional: true, default: false },
    comment: PropCommentRw,
    disabled: PropDisabledRw,
    mac_address: { type: 'string', computed: true },
    actual_mtu: PropActualMtuRo,
    l2mtu: PropL2MtuRo,
    running: PropRunningRo,
  },
};
