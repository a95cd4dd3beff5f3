import type { NotifierPort } from '../../src/ports/NotifierPort';

export type RecordedNotice = { sessionId: string; message: string };

export function makeRecordingNotifier(): NotifierPort & { notices: RecordedNotice[]; messages: () => string[] } {
  const notices: RecordedNotice[] = [];
  return {
    notices,
    notify: (sessionId, message) => {
      notices.push({ sessionId, message });
    },
    messages: () => notices.map((notice) => notice.message),
  };
}
