import {
  Client,
  ClientOptions,
  EqualityFilter,
  InvalidCredentialsError,
  OrFilter,
  SearchOptions,
  SearchResult,
  SubstringFilter
} from 'ldapts';
import { DirectoryConfig } from '../config';
import {
  AuthFailureReason,
  DirectoryAuthResult,
  DirectoryCredential,
  Identity
} from '../models/Identity';
import { ExternalServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

type DirectoryEntry = SearchResult['searchEntries'][number];

/**
 * The subset of an LDAP client the directory service needs. `ldapts` Client
 * satisfies it; tests pass in-process fakes.
 */
export interface DirectoryConnection {
  bind(dn: string, password: string): Promise<void>;
  search(baseDN: string, options: SearchOptions): Promise<SearchResult>;
  unbind(): Promise<void>;
}

export type DirectoryConnectionFactory = (options: ClientOptions) => DirectoryConnection;

const createLdapClient: DirectoryConnectionFactory = options => new Client(options);

const PEOPLE_SEARCH_LIMIT = 25;

const NETWORK_TIMEOUT = /time(?:d\s|\s)?out/i;

/**
 * Maps anything thrown during a bind to a typed failure reason.
 */
export function classifyDirectoryError(error: unknown): AuthFailureReason {
  if (error instanceof InvalidCredentialsError) {
    return 'INVALID_CREDENTIALS';
  }

  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
  const message = error instanceof Error ? error.message : String(error);

  if (code === 'ETIMEDOUT' || NETWORK_TIMEOUT.test(message)) {
    return 'TIMEOUT';
  }
  return 'SERVICE_UNAVAILABLE';
}

function findAttribute(entry: DirectoryEntry, name: string): DirectoryEntry[string] | undefined {
  const key = Object.keys(entry).find(candidate => candidate.toLowerCase() === name.toLowerCase());
  return key === undefined ? undefined : entry[key];
}

export function readAttributeValues(entry: DirectoryEntry, name: string): string[] {
  const raw = findAttribute(entry, name);
  if (raw === undefined) {
    return [];
  }

  const values: Array<string | Buffer> = Array.isArray(raw) ? raw : [raw];
  return values.map(value => (Buffer.isBuffer(value) ? value.toString('utf8') : value));
}

export function readAttribute(entry: DirectoryEntry, name: string): string {
  return readAttributeValues(entry, name)[0] ?? '';
}

export function toIdentity(entry: DirectoryEntry, fallbackUsername: string = ''): Identity {
  const principalName = readAttribute(entry, 'userPrincipalName');
  const username = readAttribute(entry, 'sAMAccountName') || principalName || fallbackUsername;
  const mail = readAttribute(entry, 'mail');

  return {
    username,
    displayName: readAttribute(entry, 'cn') || username,
    title: readAttribute(entry, 'title'),
    distinguishedName: entry.dn,
    email: mail || (principalName.includes('@') ? principalName : '')
  };
}

/**
 * LDAP / Active Directory client. Every call opens its own connection and
 * releases it before returning, on success and failure alike.
 */
export class DirectoryService {
  private readonly config: DirectoryConfig;
  private readonly connect: DirectoryConnectionFactory;

  constructor(config: DirectoryConfig, connect: DirectoryConnectionFactory = createLdapClient) {
    this.config = config;
    this.connect = connect;
  }

  /**
   * Bind-style login. UPN-looking names bind as-is; everything else binds as DOMAIN\user.
   */
  buildBindName(username: string, domain?: string): { bindUsername: string; filter: string } {
    if (username.includes('@')) {
      return {
        bindUsername: username,
        filter: new EqualityFilter({ attribute: 'userPrincipalName', value: username }).toString()
      };
    }

    const prefix = domain || this.config.domainPrefix;
    return {
      bindUsername: prefix ? `${prefix}\\${username}` : username,
      filter: new EqualityFilter({ attribute: 'sAMAccountName', value: username }).toString()
    };
  }

  searchBase(): string {
    const baseDn = this.config.baseDn ?? '';
    return this.config.userSearchBase ? `${this.config.userSearchBase},${baseDn}` : baseDn;
  }

  async authenticate(username: string, password: string, domain?: string): Promise<DirectoryAuthResult> {
    if (!this.config.url || !this.config.baseDn) {
      logger.error('Directory server or base DN not configured');
      return { ok: false, failure: { reason: 'SERVICE_UNAVAILABLE' } };
    }

    // An empty password would be an unauthenticated bind, which most servers accept
    if (!username || !password) {
      return { ok: false, failure: { reason: 'INVALID_CREDENTIALS' } };
    }

    const { bindUsername, filter } = this.buildBindName(username, domain);
    const client = this.open(this.config.url);

    try {
      logger.debug('Attempting directory bind', { bindUsername });
      await client.bind(bindUsername, password);

      const { searchEntries } = await client.search(this.searchBase(), {
        scope: 'sub',
        filter,
        attributes: this.config.attributes
      });
      const entry = searchEntries[0];

      if (!entry) {
        logger.warn('Directory bind succeeded but no entry was found', { username });
      }

      return {
        ok: true,
        identity: entry ? toIdentity(entry, username) : {
          username,
          displayName: username,
          title: '',
          distinguishedName: '',
          email: username.includes('@') ? username : ''
        },
        groups: entry ? readAttributeValues(entry, 'memberOf') : [],
        credential: { bindUsername, password }
      };
    } catch (error) {
      const reason = classifyDirectoryError(error);
      logger.warn('Directory authentication failed', {
        username,
        reason,
        error: error instanceof Error ? error.message : String(error)
      });
      return { ok: false, failure: { reason } };
    } finally {
      await this.release(client);
    }
  }

  /**
   * Direct reports of the entry at `managerDn`, looked up with the caller's own credential.
   */
  async fetchReportees(managerDn: string, credential: DirectoryCredential): Promise<Identity[]> {
    if (!managerDn) {
      return [];
    }

    const filter = new EqualityFilter({ attribute: 'manager', value: managerDn }).toString();
    const entries = await this.lookup(credential, filter, 'fetch reportees');
    return entries.map(entry => toIdentity(entry));
  }

  async searchPeople(query: string, credential: DirectoryCredential): Promise<Identity[]> {
    const term = query.trim();
    if (!term) {
      return [];
    }

    const filter = new OrFilter({
      filters: ['cn', 'sAMAccountName', 'mail'].map(
        attribute => new SubstringFilter({ attribute, any: [term] })
      )
    }).toString();

    const entries = await this.lookup(credential, filter, 'search people');
    return entries.slice(0, PEOPLE_SEARCH_LIMIT).map(entry => toIdentity(entry));
  }

  private async lookup(
    credential: DirectoryCredential,
    filter: string,
    operation: string
  ): Promise<DirectoryEntry[]> {
    if (!this.config.url || !this.config.baseDn) {
      throw new ExternalServiceError('directory', 'Directory service is not configured');
    }

    const client = this.open(this.config.url);
    try {
      await client.bind(credential.bindUsername, credential.password);
      const { searchEntries } = await client.search(this.searchBase(), {
        scope: 'sub',
        filter,
        attributes: this.config.attributes
      });
      return searchEntries;
    } catch (error) {
      logger.error(`Directory lookup failed: ${operation}`, {
        bindUsername: credential.bindUsername,
        reason: classifyDirectoryError(error),
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ExternalServiceError('directory', 'Directory lookup failed');
    } finally {
      await this.release(client);
    }
  }

  private open(url: string): DirectoryConnection {
    return this.connect({
      url,
      timeout: this.config.timeoutMs,
      connectTimeout: this.config.connectTimeoutMs
    });
  }

  private async release(client: DirectoryConnection): Promise<void> {
    try {
      await client.unbind();
    } catch (error) {
      logger.warn('Failed to release directory connection', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
