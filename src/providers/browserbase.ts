import { z } from 'zod';
import type { Session, SessionOptions, BrowserbaseSession } from '../types/session.js';
import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('browserbase-provider');

const API_URL = 'https://api.browserbase.com/v1/sessions';

const SessionResponseSchema = z.object({
  id: z.string(),
  connectUrl: z.string()
});

interface BrowserbaseCredentials {
  apiKey: string;
  projectId: string;
}

export function isBrowserbaseConfigured(): boolean {
  return Boolean(process.env.BROWSERBASE_API_KEY && process.env.BROWSERBASE_PROJECT_ID);
}

function credentials(): BrowserbaseCredentials {
  const apiKey = process.env.BROWSERBASE_API_KEY;
  const projectId = process.env.BROWSERBASE_PROJECT_ID;

  if (!apiKey) {
    throw new ConfigurationError('BROWSERBASE_API_KEY environment variable is required');
  }

  if (!projectId) {
    throw new ConfigurationError('BROWSERBASE_PROJECT_ID environment variable is required');
  }

  return { apiKey, projectId };
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Create a Browserbase session with optional proxy configuration
 */
export async function createSession(options: SessionOptions = {}): Promise<Session> {
  const { apiKey, projectId } = credentials();

  const sessionRequest: Record<string, unknown> = {
    projectId,
    // Default timeout to 60 seconds
    timeout: options.timeout || 60,
    keepAlive: true
  };

  if (options.proxy) {
    sessionRequest.proxies = [{
      type: 'external',
      server: options.proxy.url,
      username: options.proxy.username,
      password: options.proxy.password
    }];
  }

  // Create session via API with retry for 504 and network errors
  let lastError: Error | undefined;
  for (let attempt = 0; attempt < 3; attempt++) {
    let response: Response;
    try {
      response = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'X-BB-API-Key': apiKey,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify(sessionRequest)
      });
    } catch (error) {
      lastError = new Error(`Network error creating Browserbase session: ${errorMessage(error)}`);
      if (attempt === 2) break;
      log.debug(`${lastError.message}, retrying`);
      await sleep(1000 * (2 ** attempt));
      continue;
    }

    if (response.ok) {
      const sessionData = SessionResponseSchema.parse(await response.json());
      const browserbaseSession: BrowserbaseSession = {
        id: sessionData.id,
        connectUrl: sessionData.connectUrl,
        projectId
      };

      return {
        provider: 'browserbase',
        browserbase: browserbaseSession,
        cleanup: () => terminateSession(browserbaseSession.id)
      };
    }

    const errorText = await response.text();
    lastError = new Error(`Failed to create Browserbase session: ${response.status} ${errorText}`);

    // Only retry on 504 Gateway Timeout
    if (response.status !== 504 || attempt === 2) break;
    log.debug(`Browserbase returned 504, retrying in ${2 ** attempt} seconds...`);
    await sleep(1000 * (2 ** attempt));
  }

  throw lastError ?? new Error('Failed to create Browserbase session');
}

/**
 * Terminate a specific session
 */
export async function terminateSession(sessionId: string): Promise<void> {
  const { apiKey, projectId } = credentials();

  const response = await fetch(`${API_URL}/${sessionId}`, {
    method: 'POST',
    headers: {
      'X-BB-API-Key': apiKey,
      'Content-Type': 'application/json'
    },
    body: JSON.stringify({
      projectId,
      status: 'REQUEST_RELEASE'
    })
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Failed to terminate session: ${response.status} ${errorText}`);
  }

  log.debug(`Session ${sessionId} termination requested`);
}
