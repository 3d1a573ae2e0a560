import { ResourceSchema } from '@netform/contracts';
import { everyInSlice, PropCommentRw, PropDisabledRw, PropNameRw, timeEqual, validationTime } from '@netform/schema';

export const SystemScheduler: ResourceSchema = {
  name: 'system_scheduler',
  path: '/system/scheduler',
  idType: 'name',
  description: 'Runs a script at a given time or interval.',
  fields: {
    name: PropNameRw,
    on_event: {
      type: 'string',
      optional: true,
      description: 'Name of the script to execute. It must be present at /system script.',
    },
    interval: {
      type: 'string',
      format: 'duration',
      optional: true,
      validate: validationTime,
      suppressDiff: timeEqual,
      description: 'Interval between two script executions. Zero disables repeated runs.',
    },
    start_date: { type: 'string', optional: true, computed: true },
    start_time: { type: 'string', optional: true, computed: true },
    policy: {
      type: 'list',
      optional: true,
      computed: true,
      validate: everyInSlice(['ftp', 'reboot', 'read', 'write', 'policy', 'test', 'password', 'sniff', 'sensitive', 'romon']),
      description: 'Permissions of the scheduled script.',
    },
    comment: PropCommentRw,
    disabled: PropDisabledRw,
    owner: { type: 'string', computed: true },
    run_count: { type: 'string', computed: true, description: 'How many times the script has run.' },
    next_run: { type: 'string', computed: true },
  },
};
