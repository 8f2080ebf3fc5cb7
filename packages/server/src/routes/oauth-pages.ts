/**
 * Static pages for the upstream OAuth callback
 *
 * Only a fixed set of reasons ever reaches the page or the redirect query;
 * error messages from the failing layer are logged, never shown.
 */

import { AuthenticationError, PierreError, ProviderError, ValidationError } from '@pierre/core';

export type CallbackFailureReason =
  | 'access_denied'
  | 'invalid_state'
  | 'tenant_missing'
  | 'token_exchange_failed'
  | 'configuration_error'
  | 'server_error';

const REASON_TEXT: Record<CallbackFailureReason, { title: string; description: string }> = {
  access_denied: {
    title: 'Authorization was declined',
    description: 'The provider reported that access was not granted. You can try connecting again.',
  },
  invalid_state: {
    title: 'This authorization link has expired',
    description: 'The request was already used or is too old. Start the connection again from the app.',
  },
  tenant_missing: {
    title: 'No organization for this account',
    description: 'Create or join an organization before connecting a provider.',
  },
  token_exchange_failed: {
    title: 'The provider rejected the connection',
    description: 'The authorization code could not be exchanged for an access token. Please try again.',
  },
  configuration_error: {
    title: 'This provider is not configured',
    description: 'Ask an administrator to configure OAuth credentials for this provider.',
  },
  server_error: {
    title: 'Something went wrong',
    description: 'The connection could not be completed. Please try again later.',
  },
};

/**
 * Classify a callback failure by error type
 */
export function callbackFailureReason(err: unknown): CallbackFailureReason {
  if (err instanceof AuthenticationError) {
    return 'invalid_state';
  }
  if (err instanceof ProviderError) {
    return 'token_exchange_failed';
  }
  if (err instanceof ValidationError) {
    return err.details?.reason === 'tenant_missing' ? 'tenant_missing' : 'configuration_error';
  }
  return 'server_error';
}

export function callbackFailureStatus(err: unknown): number {
  if (err instanceof ProviderError) {
    return 502;
  }
  return err instanceof PierreError && err.statusCode < 500 ? 400 : 500;
}

/**
 * Escape HTML special characters: & < > " '
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function page(title: string, body: string): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
</head>
<body>
<main>
${body}
</main>
</body>
</html>
`;
}

export function renderCallbackSuccess(providerDisplayName: string): string {
  const name = escapeHtml(providerDisplayName);
  return page(
    `${providerDisplayName} connected`,
    `<h1>${name} connected</h1>
<p>Your ${name} account is now linked. You can close this window.</p>`
  );
}

export function renderCallbackFailure(providerDisplayName: string, reason: CallbackFailureReason): string {
  const text = REASON_TEXT[reason];
  return page(
    text.title,
    `<h1>${escapeHtml(text.title)}</h1>
<p>${escapeHtml(text.description)}</p>
<p>Provider: ${escapeHtml(providerDisplayName)}</p>`
  );
}
