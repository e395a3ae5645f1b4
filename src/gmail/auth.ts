import { google } from 'googleapis';
import { OAuth2Client } from 'google-auth-library';
import fs from 'fs-extra';
import path from 'path';
import readline from 'readline';
import { configurationError } from '../utils/errors';

const SCOPES = [
  'https://www.googleapis.com/auth/gmail.modify', // read + apply the claim label
  'https://www.googleapis.com/auth/gmail.send',
  'https://www.googleapis.com/auth/spreadsheets',
];

export interface AuthPaths {
  credentialsPath: string;
  tokenPath: string;
}

const DEFAULT_PATHS: AuthPaths = {
  credentialsPath: path.join(process.cwd(), 'credentials.json'),
  tokenPath: path.join(process.cwd(), 'token.json'),
};

interface ClientSecret {
  client_id: string;
  client_secret: string;
  redirect_uris: string[];
}

function readClientSecret(raw: unknown): ClientSecret | null {
  if (typeof raw !== 'object' || raw === null) return null;
  const record: Record<string, unknown> = { ...raw };
  const section = record.installed ?? record.web;
  if (typeof section !== 'object' || section === null) return null;

  const secret: Record<string, unknown> = { ...section };
  const uris = secret.redirect_uris;
  if (typeof secret.client_id !== 'string' || typeof secret.client_secret !== 'string' || !Array.isArray(uris)) {
    return null;
  }
  return {
    client_id: secret.client_id,
    client_secret: secret.client_secret,
    redirect_uris: uris.filter((u): u is string => typeof u === 'string'),
  };
}

let cachedClient: Promise<OAuth2Client> | null = null;

/**
 * OAuth client shared by the Gmail and Sheets clients within one process.
 */
export function authorize(paths: AuthPaths = DEFAULT_PATHS): Promise<OAuth2Client> {
  if (!cachedClient) {
    cachedClient = loadClient(paths).catch((error: unknown) => {
      cachedClient = null;
      throw error;
    });
  }
  return cachedClient;
}

async function loadClient(paths: AuthPaths): Promise<OAuth2Client> {
  let credentials: ClientSecret | null;
  try {
    credentials = readClientSecret(await fs.readJson(paths.credentialsPath));
  } catch (error: unknown) {
    throw configurationError(
      `Error loading client secret file at ${paths.credentialsPath}. Please create one from Google Cloud Console.`,
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
  if (!credentials) {
    throw configurationError(`${paths.credentialsPath} is not an OAuth client secret file`);
  }

  const { client_secret, client_id, redirect_uris } = credentials;
  const oAuth2Client = new google.auth.OAuth2(client_id, client_secret, redirect_uris[0]);

  if (await fs.pathExists(paths.tokenPath)) {
    oAuth2Client.setCredentials(await fs.readJson(paths.tokenPath));
    return oAuth2Client;
  }
  return getNewToken(oAuth2Client, paths.tokenPath);
}

async function getNewToken(oAuth2Client: OAuth2Client, tokenPath: string): Promise<OAuth2Client> {
  const authUrl = oAuth2Client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
  });
  console.log('Authorize this app by visiting this url:', authUrl);
  console.log('\nNOTE: If you are redirected to "This site can\'t be reached" (localhost),');
  console.log('copy the "code" parameter from the URL in your browser address bar.');
  console.log('Example: http://localhost/?code=4/0Acv...&scope=... -> Copy "4/0Acv..."\n');

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const input = await new Promise<string>(resolve => {
    rl.question('Enter the code from that page here: ', answer => {
      rl.close();
      resolve(answer);
    });
  });

  // Handle if user pastes full URL
  let code = input.trim();
  const match = code.match(/code=([^&]*)/);
  if (match) {
    code = decodeURIComponent(match[1]);
  }

  const { tokens } = await oAuth2Client.getToken(code);
  oAuth2Client.setCredentials(tokens);
  await fs.outputJson(tokenPath, tokens);
  console.log('Token stored to', tokenPath);
  return oAuth2Client;
}
