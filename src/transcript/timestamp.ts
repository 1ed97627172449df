const pad = (value: number) => value.toString().padStart(2, '0');

/**
 * Formats an elapsed duration in milliseconds as `H:MM:SS`.
 * Hours are not wrapped at 24 and sub-second precision is dropped.
 */
export const formatTimestamp = (ms: number): string => {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new RangeError(`Invalid duration in milliseconds: ${ms}`);
  }

  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return `${hours}:${pad(minutes)}:${pad(seconds)}`;
};
