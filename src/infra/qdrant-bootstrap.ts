import { execFileSync } from 'node:child_process';
import { BootstrapError } from '../errors.js';
import { getConfig } from '../config.js';
import { getQdrantDataDir } from '../paths.js';

const CONTAINER_NAME = 'strata-qdrant';
const HEALTH_TIMEOUT_MS = 30_000;
const HEALTH_POLL_MS = 500;

/**
 * Make sure the vector index backend answers. A local URL that does not respond
 * gets a Docker container with its storage under the data directory; a remote
 * one is reported as is.
 */
export async function bootstrapQdrant(): Promise<string> {
  const config = getConfig();
  const url = config.qdrantUrl;

  if (await isQdrantHealthy(url, config.qdrantApiKey)) {
    console.log(`Qdrant reachable at ${url}`);
    return url;
  }

  if (!isLocalUrl(url)) {
    throw new BootstrapError(`Qdrant not reachable at ${url}. Check QDRANT_URL and QDRANT_API_KEY.`);
  }

  console.log(`Qdrant not reachable at ${url}. Attempting Docker auto-provision...`);

  if (!isDockerAvailable()) {
    throw new BootstrapError(
      `Qdrant not reachable at ${url} and Docker not found.\n` +
        `Either: (a) install Docker and retry, or (b) set QDRANT_URL to your Qdrant instance.`,
    );
  }

  const containerState = getContainerState();

  if (containerState === 'running') {
    console.log(`Container "${CONTAINER_NAME}" is running. Waiting for health...`);
  } else if (containerState === 'stopped') {
    console.log(`Container "${CONTAINER_NAME}" exists but stopped. Starting...`);
    execFileSync('docker', ['start', CONTAINER_NAME], { stdio: 'pipe' });
  } else {
    const port = new URL(url).port || '6333';
    console.log(`Creating new Qdrant container "${CONTAINER_NAME}"...`);
    execFileSync(
      'docker',
      [
        'run',
        '-d',
        '--name',
        CONTAINER_NAME,
        '--restart',
        'unless-stopped',
        '-p',
        `${port}:6333`,
        '-v',
        `${getQdrantDataDir()}:/qdrant/storage`,
        'qdrant/qdrant',
      ],
      { stdio: 'pipe' },
    );
  }

  const healthy = await waitForHealth(url, config.qdrantApiKey, HEALTH_TIMEOUT_MS);
  if (!healthy) {
    throw new BootstrapError(
      `Qdrant container started but failed health check after ${HEALTH_TIMEOUT_MS / 1000}s. ` +
        `Check: docker logs ${CONTAINER_NAME}`,
    );
  }

  console.log(`Qdrant auto-provisioned and healthy at ${url}`);
  return url;
}

function isLocalUrl(url: string): boolean {
  try {
    const { hostname } = new URL(url);
    return hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '[::1]';
  } catch {
    return false;
  }
}

async function isQdrantHealthy(url: string, apiKey: string | undefined): Promise<boolean> {
  try {
    const resp = await fetch(`${url}/healthz`, {
      headers: apiKey ? { 'api-key': apiKey } : {},
      signal: AbortSignal.timeout(3000),
    });
    return resp.ok;
  } catch {
    return false;
  }
}

function isDockerAvailable(): boolean {
  try {
    execFileSync('docker', ['info'], { stdio: 'pipe', timeout: 10_000 });
    return true;
  } catch {
    return false;
  }
}

function getContainerState(): 'running' | 'stopped' | 'none' {
  try {
    const output = execFileSync(
      'docker',
      ['ps', '-a', '--filter', `name=^/${CONTAINER_NAME}$`, '--format', '{{.State}}'],
      { encoding: 'utf-8', stdio: 'pipe' },
    ).trim();

    if (!output) return 'none';
    if (output === 'running') return 'running';
    return 'stopped';
  } catch {
    return 'none';
  }
}

async function waitForHealth(url: string, apiKey: string | undefined, timeoutMs: number): Promise<boolean> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await isQdrantHealthy(url, apiKey)) return true;
    await new Promise((r) => setTimeout(r, HEALTH_POLL_MS));
  }
  return false;
}
