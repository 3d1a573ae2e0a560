import { ResourceSchema } from '@netform/contracts';
import {
  intBetween,
  PropArpRw,
  PropArpTimeoutRw,
  PropCommentRw,
  PropDisabledRw,
  PropInterfaceRw,
  PropL2MtuRo,
  PropMtuRw,
  PropNameRw,
  PropRunningRo,
} from '@netform/schema';

export const InterfaceVlan: ResourceSchema = {
  name: 'interface_vlan',
  path: '/interface/vlan',
  idType: 'name',
  fields: {
    name: PropNameRw,
    interface: PropInterfaceRw,
    vlan_id: { type: 'int', required: true, validate: intBetween(1, 4094), description: 'Virtual LAN identifier or tag.' },
    mtu: PropMtuRw(),
    arp: PropArpRw,
    arp_timeout: PropArpTimeoutRw,
    use_service_tag: { type: 'bool', optional: true },
    comment: PropCommentRw,
    disabled: PropDisabledRw,
    mac_address: { type: 'string', computed: true },
    l2mtu: PropL2MtuRo,
    running: PropRunningRo,
  },
};
