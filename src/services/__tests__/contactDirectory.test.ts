import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryMessageStore } from '../../storage/memoryMessageStore.js';
import { ContactDirectory } from '../contactDirectory.js';
import { FakeSession } from '../../__tests__/fakes.js';

const ALICE = '15550001111@s.whatsapp.net';
const BOB = '15550002222@s.whatsapp.net';
const CAROL = '15550003333@s.whatsapp.net';

describe('ContactDirectory', () => {
  let store: MemoryMessageStore;
  let session: FakeSession;
  let directory: ContactDirectory;

  beforeEach(async () => {
    store = new MemoryMessageStore();
    session = new FakeSession();
    directory = new ContactDirectory(store, session);
    await store.upsertContact({ id: ALICE, displayName: 'Alice (saved)', pushName: 'Ali', isGroup: false, isBlocked: false });
    session.directory = [
      { id: ALICE, fullName: 'Alice Directory', pushName: 'Ali' },
      { id: BOB, fullName: 'Bob Alison' },
      { id: CAROL, pushName: 'Carol' }
    ];
  });

  it('prefers the stored entry and fills gaps from the directory', async () => {
    const contacts = await directory.search('ali');

    expect(contacts).toEqual([
      { id: ALICE, displayName: 'Alice (saved)', pushName: 'Ali', isGroup: false, isBlocked: false },
      { id: BOB, displayName: 'Bob Alison', pushName: '', isGroup: false, isBlocked: false }
    ]);
  });

  it('matches directory entries by id', async () => {
    const contacts = await directory.search('3333');

    expect(contacts.map((c) => c.id)).toEqual([CAROL]);
  });

  it('falls back to stored contacts when the directory is unavailable', async () => {
    session.directoryError = new Error('not logged in');

    const contacts = await directory.search('ali');

    expect(contacts.map((c) => c.displayName)).toEqual(['Alice (saved)']);
  });
});
