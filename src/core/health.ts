/**
 * Health invariants surfaced to the model in the dynamic context layer.
 */

export interface HealthSources {
  readRepoFile(relPath: string): Promise<string | undefined>;
  /** Epoch ms the identity file was last written, if it exists */
  identityUpdatedAt(): Promise<number | undefined>;
  now(): number;
}

const README_VERSION = /\*\*Version:\*\*\s*`?v?([^\s`]+)`?/;

export function readmeVersion(readme: string): string | undefined {
  return README_VERSION.exec(readme)?.[1];
}

/**
 * Findings, one line each. Empty when everything holds or the files to
 * compare are missing.
 */
export async function checkHealthInvariants(sources: HealthSources, staleIdentityHours: number): Promise<string[]> {
  const findings: string[] = [];

  const [versionFile, readme] = await Promise.all([
    sources.readRepoFile('VERSION'),
    sources.readRepoFile('README.md'),
  ]);
  const version = versionFile?.trim().replace(/^v/, '');
  const documented = readme === undefined ? undefined : readmeVersion(readme);
  if (version && documented && version !== documented) {
    findings.push(`VERSION DESYNC: VERSION file says ${version}, README.md says ${documented}`);
  }

  const identityAt = await sources.identityUpdatedAt();
  if (identityAt !== undefined) {
    const ageHours = (sources.now() - identityAt) / 3_600_000;
    if (ageHours > staleIdentityHours) {
      findings.push(`STALE IDENTITY: identity.md last updated ${Math.floor(ageHours)}h ago (limit ${staleIdentityHours}h)`);
    }
  }

  return findings;
}
