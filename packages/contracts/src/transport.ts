import type { DeviceRecord, FilterSet } from './index';

export type TransportOperation = 'read' | 'add' | 'set' | 'remove' | 'move';

export interface TransportRequest {
  operation: TransportOperation;
  /** Resource path on the device, e.g. `/system/scheduler` */
  path: string;
  /** Wire parameters of the command (`.id`, changed fields, `destination`, ...) */
  params: DeviceRecord;
  filters: FilterSet;
}

/**
 * Executes exactly one command against the device.
 * Rejects with the device's error text; retry policy, if any, lives in the implementation.
 */
export interface ITransport {
  execute(request: TransportRequest): Promise<DeviceRecord[]>;
}
