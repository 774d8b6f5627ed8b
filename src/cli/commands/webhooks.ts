/**
 * Webhooks Command - registered webhook subscriptions
 */

import { Command } from 'commander';
import type { Webhook } from '../../api/index.js';
import type { TableSpec } from '../../output/index.js';
import type { KeyValue } from '../../utils/table.js';
import type { GetContext } from '../types.js';
import { createGetSubcommand, createListSubcommand, yesNo } from './shared.js';

export const WEBHOOK_TABLE: TableSpec<Webhook> = {
  columns: [
    { header: 'ID', key: 'id' },
    { header: 'TOPIC', key: 'topic' },
    { header: 'URL', key: 'url' },
    { header: 'ENABLED', key: 'enabled' },
  ],
  row: (webhook) => ({
    id: webhook.Id,
    topic: webhook.Topic,
    url: webhook.Address,
    enabled: yesNo(webhook.Enabled),
  }),
};

function webhookDetails(webhook: Webhook): KeyValue[] {
  return [
    ['ID', webhook.Id],
    ['Topic', webhook.Topic],
    ['URL', webhook.Address],
    ['Type', webhook.Type],
    ['Enabled', yesNo(webhook.Enabled)],
    ['Created', webhook.Created],
    ['Modified', webhook.Modified],
  ];
}

export function createWebhooksCommand(getContext: GetContext): Command {
  return new Command('webhooks')
    .alias('webhook')
    .description('List and inspect webhooks')
    .addCommand(
      createListSubcommand(getContext, {
        description: 'List webhooks',
        noun: 'webhooks',
        fetch: (api, flags) => api.listWebhooks({ limit: flags.limit, offset: flags.offset }),
        table: WEBHOOK_TABLE,
      })
    )
    .addCommand(
      createGetSubcommand(getContext, {
        description: 'Show one webhook',
        idLabel: 'webhook ID',
        fetch: (api, id) => api.getWebhook(id),
        details: webhookDetails,
      })
    );
}
