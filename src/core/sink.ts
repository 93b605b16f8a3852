/**
 * Persistence hook for rejected messages. Implemented by the host project
 * against its own storage; nothing in this package writes anywhere.
 */
export interface VerdictSink {
  /**
   * @param currentTime - local time formatted as `YYYY-MM-DD HH:MM:SS`
   */
  saveMaliciousMessage(
    fromUserId: number,
    toUserId: number,
    messageText: string,
    errorCode: string,
    reason: string,
    currentTime: string,
  ): Promise<void> | void;
}

/** Forward to `sink` when one is given; without a sink nothing is saved. */
export async function saveMaliciousMessage(
  sink: VerdictSink | undefined,
  fromUserId: number,
  toUserId: number,
  messageText: string,
  errorCode: string,
  reason: string,
  currentTime: string,
): Promise<void> {
  if (!sink) return;
  await sink.saveMaliciousMessage(fromUserId, toUserId, messageText, errorCode, reason, currentTime);
}

const pad = (n: number) => String(n).padStart(2, "0");

export function formatTimestamp(date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}
