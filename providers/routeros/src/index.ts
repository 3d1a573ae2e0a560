import { ITransport } from '@netform/contracts';
import { EngineProvider, ResourceEngineOptions } from '@netform/engine';
import { SchemaRegistry } from '@netform/schema';

import { InterfaceBridge } from './resources/InterfaceBridge';
import { InterfaceVlan } from './resources/InterfaceVlan';
import { IpFirewallFilter } from './resources/IpFirewallFilter';
import { SystemScheduler } from './resources/SystemScheduler';

export function createRouterOSRegistry(): SchemaRegistry {
  return SchemaRegistry.build([SystemScheduler, InterfaceVlan, InterfaceBridge, IpFirewallFilter]);
}

/** Built once and shared read-only */
export const routerOSRegistry = createRouterOSRegistry();

export class RouterOSProvider extends EngineProvider {
  constructor(transport: ITransport, options: ResourceEngineOptions = {}) {
    super(routerOSRegistry, transport, options);
  }
}

export { InterfaceBridge } from './resources/InterfaceBridge';
export { InterfaceVlan } from './resources/InterfaceVlan';
export { IpFirewallFilter } from './resources/IpFirewallFilter';
export { SystemScheduler } from './resources/SystemScheduler';
