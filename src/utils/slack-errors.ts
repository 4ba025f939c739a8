/**
 * Hints for Slack Web API failures seen when posting or deleting messages.
 */

interface SlackErrorHint {
  pattern: RegExp;
  hint: string;
}

const HINTS: SlackErrorHint[] = [
  {
    pattern: /missing_scope/i,
    hint: 'add the chat:write / im:write scopes and reinstall the app',
  },
  {
    pattern: /rate[_-]?limit/i,
    hint: 'Slack rate limit hit, the message was dropped',
  },
  {
    pattern: /not_in_channel|channel_not_found/i,
    hint: 'the bot is not a member of that conversation',
  },
  {
    pattern: /cannot_dm_bot|user_not_found/i,
    hint: 'the recipient is not a reachable user',
  },
  {
    pattern: /message_not_found|cant_delete_message/i,
    hint: 'the message is gone or was not posted by the bot',
  },
  {
    pattern: /invalid_auth|token_revoked|token_expired|not_authed/i,
    hint: 'check SLACK_BOT_TOKEN',
  },
];

/**
 * Error message with a remediation hint appended when the Slack error code
 * is a known one
 */
export function describeSlackError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const match = HINTS.find(({ pattern }) => pattern.test(message));
  return match ? `${message} (${match.hint})` : message;
}
