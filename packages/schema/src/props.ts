import { FieldSchema } from '@netform/contracts';

import { stringInSlice, stringMatch, validateMtu } from './validators';

/** Ordering field of kinds positioned with `place-before` */
export const KeyPlaceBefore = 'place_before';

export const PropActualMtuRo: FieldSchema = {
  type: 'int',
  computed: true,
};

export const PropArpRw: FieldSchema = {
  type: 'string',
  optional: true,
  default: 'enabled',
  description: 'ARP resolution protocol mode.',
  validate: stringInSlice(['disabled', 'enabled', 'local-proxy-arp', 'proxy-arp', 'reply-only']),
};

export const PropArpTimeoutRw: FieldSchema = {
  type: 'string',
  optional: true,
  default: 'auto',
  description:
    'How long an ARP record is kept after no packets are received from the IP. `auto` follows the IP settings ' +
    '(30s by default). Accepts ms, s, m, h, d postfixes; without one the value is in seconds.',
  validate: stringMatch(/^$|^auto$|^(\d+(ms|s|m|M|h|d)?)+$/, "expected arp_timeout value to be 'auto' string or time value"),
};

export const PropCommentRw: FieldSchema = {
  type: 'string',
  optional: true,
};

export const PropDisabledRw: FieldSchema = {
  type: 'bool',
  optional: true,
  default: false,
};

export const PropDynamicRo: FieldSchema = {
  type: 'bool',
  computed: true,
  description: 'Configuration item created by software, not by management interface. It is not exported, and cannot be directly modified.',
};

export const PropInterfaceRw: FieldSchema = {
  type: 'string',
  required: true,
  description: 'Name of the interface.',
};

export const PropInvalidRo: FieldSchema = {
  type: 'bool',
  computed: true,
};

export const PropL2MtuRo: FieldSchema = {
  type: 'int',
  computed: true,
  description: 'Layer2 Maximum transmission unit.',
};

export const PropNameRw: FieldSchema = {
  type: 'string',
  required: true,
};

export const PropPlaceBefore: FieldSchema = {
  type: 'string',
  optional: true,
  description:
    'Id of the item this one is inserted before. The device never reports it back; the position is ' +
    'checked against the item that currently follows this one.',
};

export const PropRunningRo: FieldSchema = {
  type: 'bool',
  computed: true,
};

/** MTU value can be integer or 'auto' */
export function PropMtuRw(): FieldSchema {
  return {
    type: 'string',
    format: 'int_or_auto',
    range: [0, 65_535],
    optional: true,
    computed: true,
    validate: validateMtu,
    description: "Layer3 Maximum transmission unit ('auto', 0 .. 65535)",
  };
}
