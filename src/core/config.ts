/**
 * .gitreview configuration
 *
 * Read from ~/.gitreview and then from the nearest .gitreview above the
 * working directory; keys of the later file win.
 *
 *   [gerrit]
 *   host = review.example.com
 *   project = platform/tools.git
 *   defaultbranch = main
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { Errors } from './errors';
import { exists, findUp, readFileText } from '../utils/fs';

export const GITREVIEW_FILE = '.gitreview';

// git-review's SSH port; HTTP access never uses it
const SSH_PORT = 29418;

/**
 * Settings the review client and commands work with
 */
export interface GerritConfig {
  scheme: 'http' | 'https';
  host: string;
  port: number | null;
  project: string | null;
  branch: string;
  remote: string;
  username: string | null;
  password: string | null;
}

const gerritSectionSchema = z.object({
  host: z.string({ required_error: 'host is required' }).min(1, 'host is required'),
  scheme: z.enum(['http', 'https']).optional(),
  port: z
    .string()
    .regex(/^\d+$/, 'port must be a number')
    .transform(Number)
    .optional(),
  project: z.string().optional(),
  defaultbranch: z.string().min(1).default('master'),
  defaultremote: z.string().min(1).default('gerrit'),
  username: z.string().optional(),
  password: z.string().optional(),
  token: z.string().optional(),
});

/**
 * Parse INI-style config file
 */
export function parseConfig(content: string): Map<string, Map<string, string>> {
  const sections = new Map<string, Map<string, string>>();
  let currentSection = '';

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      continue;
    }

    // Section header: [section] or [section "subsection"]
    const sectionMatch = trimmed.match(/^\[([^\s\]]+)(?:\s+"([^"]+)")?\]$/);
    if (sectionMatch) {
      const sectionName = sectionMatch[1].toLowerCase();
      const subsection = sectionMatch[2];
      currentSection = subsection ? `${sectionName}.${subsection}` : sectionName;
      if (!sections.has(currentSection)) {
        sections.set(currentSection, new Map());
      }
      continue;
    }

    // Key-value pair; keys are case-insensitive
    const kvMatch = trimmed.match(/^([^=]+?)\s*=\s*(.*)$/);
    const section = sections.get(currentSection);
    if (kvMatch && section) {
      section.set(kvMatch[1].trim().toLowerCase(), unquote(kvMatch[2].trim()));
    }
  }

  return sections;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

/**
 * Turn merged [gerrit] keys into a validated config
 */
export function toGerritConfig(values: ReadonlyMap<string, string>, file?: string): GerritConfig {
  const result = gerritSectionSchema.safeParse(Object.fromEntries(values));

  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.') || 'gerrit'}: ${issue.message}`);
    throw Errors.config(`Invalid [gerrit] configuration: ${problems.join('; ')}`, file);
  }

  const section = result.data;
  const host = splitHost(section.host);
  const port = section.port ?? host.port;

  return {
    scheme: host.scheme ?? section.scheme ?? 'https',
    host: host.host,
    port: port === undefined || port === SSH_PORT ? null : port,
    project: section.project ? section.project.replace(/\.git$/, '') : null,
    branch: section.defaultbranch,
    remote: section.defaultremote,
    username: section.username ?? null,
    password: section.password ?? section.token ?? null,
  };
}

/**
 * "https://review.example.com:8443/" -> scheme, host and port
 */
function splitHost(raw: string): { host: string; scheme?: 'http' | 'https'; port?: number } {
  const match = raw.trim().match(/^(?:(https?):\/\/)?([^/:]+)(?::(\d+))?\/*$/);
  if (!match) {
    throw Errors.config(`Invalid host in .gitreview: ${raw}`);
  }

  const [, scheme, host, port] = match;
  return {
    host,
    scheme: scheme === 'http' || scheme === 'https' ? scheme : undefined,
    port: port ? parseInt(port, 10) : undefined,
  };
}

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
}

export interface LoadedConfig {
  config: GerritConfig;
  /** Files read, lowest precedence first */
  files: string[];
}

/**
 * Locate, merge and validate the .gitreview files
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const files: string[] = [];
  const globalFile = path.join(homeDir, GITREVIEW_FILE);
  if (exists(globalFile)) {
    files.push(globalFile);
  }
  const localFile = findUp(GITREVIEW_FILE, cwd);
  if (localFile && !files.includes(localFile)) {
    files.push(localFile);
  }

  if (files.length === 0) {
    throw Errors.config(`No ${GITREVIEW_FILE} found in ${cwd}, its parents or ${homeDir}`);
  }

  const merged = new Map<string, string>();
  for (const file of files) {
    const section = parseConfig(readFileText(file)).get('gerrit');
    if (!section) {
      throw Errors.config(`${file} has no [gerrit] section`, file);
    }
    for (const [key, value] of section) {
      merged.set(key, value);
    }
  }

  return { config: toGerritConfig(merged, files[files.length - 1]), files };
}

/**
 * Base URL of the REST API, without the authentication prefix
 */
export function baseUrl(config: GerritConfig): string {
  return `${config.scheme}://${config.host}${config.port === null ? '' : `:${config.port}`}`;
}
