/**
 * Test data builders
 */

import type { Location } from '../../../src/models/location.js';
import type { PlatformEntity, PlatformWord, RetrievedDocument } from '../../../src/models/wire.js';
import type { Logger } from '../../../src/utils/logger.js';

export function loc(left: number, top: number, width: number = 0.1, height: number = 0.02, page: number = 0): Location {
  return { left, top, width, height, page };
}

export function word(uid: string, text: string, location: Location): PlatformWord {
  return { uid, word: text, location, confidence: 0.99 };
}

export function entity(uid: string, label: string, sourceWordUids: string[]): PlatformEntity {
  return { uid, label, source_word_uids: sourceWordUids };
}

export function retrievedDoc(
  uid: string,
  name: string,
  words: PlatformWord[] = [],
  entities: PlatformEntity[] = []
): RetrievedDocument {
  return { uid, name, text: { words }, entities };
}

export interface LogLine {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
}

/**
 * Logger that records every line instead of writing it
 */
export function captureLogger(): { log: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  return {
    lines,
    log: {
      debug: (message) => lines.push({ level: 'debug', message }),
      info: (message) => lines.push({ level: 'info', message }),
      warn: (message) => lines.push({ level: 'warn', message }),
      error: (message) => lines.push({ level: 'error', message }),
    },
  };
}

export function messagesAt(lines: readonly LogLine[], level: LogLine['level']): string[] {
  return lines.filter((l) => l.level === level).map((l) => l.message);
}
