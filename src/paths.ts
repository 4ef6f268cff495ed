import path from 'path';

export function joinPosix(...parts: string[]): string {
  return parts
    .filter(Boolean)
    .join('/')
    .replace(/\/+/g, '/')
    .replace(/\/$/, '');
}

/** Drops the last extension: `Casper.dcl.md` -> `Casper.dcl`, `.hidden` stays */
export function stripExtension(name: string): string {
  return path.posix.parse(name).name;
}

export function removeSuffix(value: string, suffix: string): string {
  return suffix && value.endsWith(suffix) ? value.slice(0, -suffix.length) : value;
}

/** Orders strings by code point, independent of locale */
export function compareCodePoints(left: string, right: string): number {
  if (left === right) return 0;
  const leftPoints = Array.from(left);
  const rightPoints = Array.from(right);
  const length = Math.min(leftPoints.length, rightPoints.length);

  for (let i = 0; i < length; i++) {
    const difference = (leftPoints[i].codePointAt(0) ?? 0) - (rightPoints[i].codePointAt(0) ?? 0);
    if (difference !== 0) {
      return difference;
    }
  }

  return leftPoints.length - rightPoints.length;
}
