import { ConfigService } from '@nestjs/config';
import { InMemoryStorage } from '../../test/support/in-memory.storage';
import { LibraryException } from '../shared/errors';
import { LibraryStore } from './library.store';

describe('LibraryStore', () => {
    let storage: InMemoryStorage;

    const createStore = (seed: boolean) =>
        new LibraryStore(storage, new ConfigService({ LIBRARY_SEED: seed }));

    beforeEach(() => {
        storage = new InMemoryStorage();
    });

    describe('load', () => {
        it('should seed 10 books and 12 members into empty storage and save them', async () => {
            const store = createStore(true);
            await store.load();

            expect(store.books.size).toBe(10);
            expect(store.members.size).toBe(12);
            expect(store.books.get('B0001')).toEqual({
                bookId: 'B0001',
                title: 'Python Basics',
                author: 'John Smith',
                totalCopies: 4,
                activeLoans: [],
            });
            expect(store.books.get('B0010')?.title).toBe('Cloud Computing');
            expect(store.members.get('M0001')).toEqual({
                memberId: 'M0001',
                name: 'Alice Carter',
                contact: 'alice@example.com',
                borrowedBooks: [],
            });
            expect(storage.writes).toEqual(['books', 'members']);
        });

        it('should leave empty storage empty when seeding is disabled', async () => {
            const store = createStore(false);
            await store.load();

            expect(store.books.size).toBe(0);
            expect(store.members.size).toBe(0);
            expect(storage.writes).toEqual([]);
        });

        it('should only seed the collection that is empty', async () => {
            storage.put('books', [
                { book_id: 'B0001', title: 'Compilers', author: 'Aho', total_copies: 1, borrowed_records: [] },
            ]);

            const store = createStore(true);
            await store.load();

            expect([...store.books.keys()]).toEqual(['B0001']);
            expect(store.members.size).toBe(12);
        });

        it('should keep the stored order of books', async () => {
            storage.put('books', [
                { book_id: 'B0003', title: 'C', author: 'c', total_copies: 1 },
                { book_id: 'B0001', title: 'A', author: 'a', total_copies: 1 },
            ]);

            const store = createStore(false);
            await store.load();

            expect([...store.books.keys()]).toEqual(['B0003', 'B0001']);
        });

        it('should fail with MalformedStorage on a bad date', async () => {
            storage.put('members', [
                {
                    member_id: 'M0001',
                    name: 'Alice Carter',
                    contact: 'alice@example.com',
                    borrowed_books: [{ book_id: 'B0001', borrow_date: '2026-3-1', due_date: '2026-03-15' }],
                },
            ]);

            await expect(createStore(false).load()).rejects.toBeInstanceOf(LibraryException);
        });

        it('should fail with MalformedStorage on duplicate ids', async () => {
            storage.put('books', [
                { book_id: 'B0001', title: 'A', author: 'a', total_copies: 1 },
                { book_id: 'B0001', title: 'B', author: 'b', total_copies: 1 },
            ]);

            await expect(createStore(false).load()).rejects.toThrow('Malformed books storage: duplicate id B0001');
        });
    });

    describe('ids', () => {
        it('should start at 0001', async () => {
            const store = createStore(false);
            await store.load();

            expect(store.nextBookId()).toBe('B0001');
            expect(store.nextMemberId()).toBe('M0001');
        });

        it('should continue after the highest id even when lower ones are free', async () => {
            storage.put('books', [
                { book_id: 'B0002', title: 'A', author: 'a', total_copies: 1 },
                { book_id: 'B0007', title: 'B', author: 'b', total_copies: 1 },
            ]);

            const store = createStore(false);
            await store.load();

            expect(store.nextBookId()).toBe('B0008');
        });

        it('should skip ids still referenced by loans and borrowed books', async () => {
            storage.put('books', [
                {
                    book_id: 'B0001',
                    title: 'Python Basics',
                    author: 'John Smith',
                    total_copies: 1,
                    borrowed_records: [{ member_id: 'M0006', borrow_date: '2026-02-01', due_date: '2026-02-15' }],
                },
            ]);
            storage.put('members', [
                {
                    member_id: 'M0001',
                    name: 'Alice Carter',
                    contact: 'alice@example.com',
                    borrowed_books: [{ book_id: 'B0004', borrow_date: '2026-02-01', due_date: '2026-02-15' }],
                },
            ]);

            const store = createStore(false);
            await store.load();

            expect(store.nextBookId()).toBe('B0005');
            expect(store.nextMemberId()).toBe('M0007');
        });

        it('should ignore ids that do not follow the prefix pattern', async () => {
            storage.put('members', [
                { member_id: 'guest', name: 'Guest', contact: '' },
                { member_id: 'M0004', name: 'Dana Okafor', contact: 'dana@example.com' },
            ]);

            const store = createStore(false);
            await store.load();

            expect(store.nextMemberId()).toBe('M0005');
        });
    });

    describe('persist', () => {
        it('should write books before members', async () => {
            const store = createStore(false);
            await store.load();

            await store.persist();

            expect(storage.writes).toEqual(['books', 'members']);
        });

        it('should save again on shutdown', async () => {
            const store = createStore(false);
            await store.load();

            await store.onApplicationShutdown();

            expect(storage.writes).toEqual(['books', 'members']);
        });

        it('should not overwrite storage on shutdown when loading failed', async () => {
            storage.put('books', 'not an array');
            const store = createStore(false);

            await expect(store.load()).rejects.toThrow(LibraryException);
            await store.onApplicationShutdown();

            expect(storage.writes).toEqual([]);
        });

        it('should propagate write failures', async () => {
            const store = createStore(false);
            await store.load();
            jest.spyOn(storage, 'write').mockRejectedValue(new Error('disk full'));

            await expect(store.persist()).rejects.toThrow('disk full');
        });
    });
});
