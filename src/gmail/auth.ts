import { google } from 'googleapis';
import { OAuth2Client, Credentials } from 'google-auth-library';
import fs from 'fs-extra';
import readline from 'readline';
import { GmailConfig } from '../config/app';

const SCOPES = ['https://www.googleapis.com/auth/gmail.readonly'];

interface ClientSecrets {
  client_id: string;
  client_secret: string;
  redirect_uris: string[];
}

function readClientSecrets(raw: unknown, credentialsPath: string): ClientSecrets {
  if (typeof raw === 'object' && raw !== null) {
    const section = 'installed' in raw ? raw.installed : 'web' in raw ? raw.web : undefined;
    if (
      typeof section === 'object' && section !== null &&
      'client_id' in section && typeof section.client_id === 'string' &&
      'client_secret' in section && typeof section.client_secret === 'string' &&
      'redirect_uris' in section && Array.isArray(section.redirect_uris)
    ) {
      const redirectUris = section.redirect_uris.filter((uri): uri is string => typeof uri === 'string');
      if (redirectUris.length > 0) {
        return {
          client_id: section.client_id,
          client_secret: section.client_secret,
          redirect_uris: redirectUris,
        };
      }
    }
  }
  throw new Error(`Client secret file at ${credentialsPath} is not an OAuth "installed" or "web" client.`);
}

async function createOAuthClient(config: Pick<GmailConfig, 'credentialsPath' | 'tokenPath'>): Promise<OAuth2Client> {
  let raw: unknown;
  try {
    raw = await fs.readJson(config.credentialsPath);
  } catch (err) {
    throw new Error(`Error loading client secret file at ${config.credentialsPath}. Please create one from Google Cloud Console.`);
  }

  const { client_secret, client_id, redirect_uris } = readClientSecrets(raw, config.credentialsPath);
  const oAuth2Client = new google.auth.OAuth2(client_id, client_secret, redirect_uris[0]);

  // Keep refreshed access tokens (and any rotated refresh token) on disk
  oAuth2Client.on('tokens', (tokens: Credentials) => {
    const merged = { ...oAuth2Client.credentials, ...tokens };
    fs.writeJson(config.tokenPath, merged).catch((error: unknown) => {
      console.warn(`Failed to store refreshed token at ${config.tokenPath}:`, error);
    });
  });

  return oAuth2Client;
}

export async function authorize(config: Pick<GmailConfig, 'credentialsPath' | 'tokenPath'>): Promise<OAuth2Client> {
  const oAuth2Client = await createOAuthClient(config);

  try {
    const token: Credentials = await fs.readJson(config.tokenPath);
    oAuth2Client.setCredentials(token);
    return oAuth2Client;
  } catch (err) {
    return getNewToken(oAuth2Client, config.tokenPath);
  }
}

/**
 * Run the consent flow again, replacing the stored token
 */
export async function reauthorize(config: Pick<GmailConfig, 'credentialsPath' | 'tokenPath'>): Promise<OAuth2Client> {
  const oAuth2Client = await createOAuthClient(config);
  return getNewToken(oAuth2Client, config.tokenPath);
}

async function getNewToken(oAuth2Client: OAuth2Client, tokenPath: string): Promise<OAuth2Client> {
  const authUrl = oAuth2Client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent', // always hand out a refresh token
    scope: SCOPES,
  });
  console.log('Authorize this app by visiting this url:', authUrl);
  console.log('\nNOTE: If you are redirected to "This site can\'t be reached" (localhost),');
  console.log('copy the "code" parameter from the URL in your browser address bar.\n');

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
  if (code.includes('code=')) {
    const match = code.match(/code=([^&]*)/);
    if (match) {
      code = decodeURIComponent(match[1]);
    }
  }

  const { tokens } = await oAuth2Client.getToken(code);
  oAuth2Client.setCredentials(tokens);
  await fs.writeJson(tokenPath, tokens);
  console.log('Token stored to', tokenPath);
  return oAuth2Client;
}
