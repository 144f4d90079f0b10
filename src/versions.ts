// Release identifier ordering: "257", "v257", "1.2" compare numerically part by part

export function versionLabel(version: string): string {
  return version.replace(/^v/i, "");
}

function parts(version: string): number[] | undefined {
  const label = versionLabel(version);
  if (!/^\d+(\.\d+)*$/.test(label)) return undefined;
  return label.split(".").map(Number);
}

export function compareVersions(a: string, b: string): number {
  const pa = parts(a);
  const pb = parts(b);
  if (!pa || !pb) return a < b ? -1 : a > b ? 1 : 0;
  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function sortVersions(versions: readonly string[]): string[] {
  const sorted = [...versions].sort(compareVersions);
  for (let i = 1; i < sorted.length; i++) {
    if (compareVersions(sorted[i - 1], sorted[i]) === 0) {
      throw new Error(
        `Duplicate release in version chain: '${sorted[i - 1]}' and '${sorted[i]}'`
      );
    }
  }
  return sorted;
}
