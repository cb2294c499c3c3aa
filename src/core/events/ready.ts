import { Events, type Client } from 'discord.js';

import { logger } from '../logger.js';

/**
 * Logs a line once the client has logged in and runs the given callbacks
 * (scheduled jobs that need a ready client).
 */
export default function registerReadyHandler(
  client: Client,
  onReady: ((readyClient: Client<true>) => void)[] = [],
) {
  client.once(Events.ClientReady, (readyClient) => {
    logger.info({ userId: readyClient.user.id }, `✅ Logged in as ${readyClient.user.tag}`);
    for (const callback of onReady) callback(readyClient);
  });
}
