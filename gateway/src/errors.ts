import { logger } from '@tenantune/logger';
import {
  CancelledError,
  InvalidPositionError,
  LookupFailedError,
  NotFoundError,
  PlayerClosedError,
  TranscodeFailedError,
  TransportError,
  VoiceConnectError,
  describeError,
} from '@tenantune/audio';
import type { CommandRequest } from './handlers/command-request.js';

/**
 * Text shown to the user for a failed command. Unexpected errors only expose
 * the id that ties them to the log line.
 */
export function userMessageFor(error: unknown, errorId: string): string {
  if (error instanceof NotFoundError) {
    return `🤷 ${error.message}`;
  }
  if (error instanceof LookupFailedError) {
    return '😨 Could not look that up right now. Please try again later.';
  }
  if (error instanceof InvalidPositionError) {
    return `🤷🏽 Invalid position. ${error.message}`;
  }
  if (error instanceof VoiceConnectError) {
    return '🔇 Could not join your voice channel.';
  }
  if (error instanceof PlayerClosedError) {
    return 'The player just stopped. Please run the command again.';
  }
  if (error instanceof TranscodeFailedError || error instanceof TransportError) {
    return `Audio error: ${error.message}`;
  }
  if (error instanceof CancelledError) {
    return 'The request was cancelled.';
  }
  return `Something went wrong. Please try again later. (Error ID: ${errorId})`;
}

export async function handleInteractionError(
  error: unknown,
  request: Pick<CommandRequest, 'respond' | 'tenantId' | 'userId' | 'textChannelId'>,
  context?: string,
): Promise<void> {
  const errorId = Math.random().toString(36).substring(2, 15);
  const fields = {
    errorId,
    error: describeError(error),
    interaction: {
      user: request.userId,
      guild: request.tenantId,
      channel: request.textChannelId,
    },
    context,
  };

  // Expected outcomes of user input stay out of the error log
  if (error instanceof NotFoundError || error instanceof InvalidPositionError) {
    logger.info(fields, 'Command rejected');
  } else {
    logger.error(fields, 'Interaction error occurred');
  }

  try {
    await request.respond({ content: userMessageFor(error, errorId), ephemeral: true });
  } catch (replyError) {
    logger.error({ errorId, replyError: describeError(replyError) }, 'Failed to send error response to user');
  }
}
