import { Inject, Injectable, Logger, OnApplicationShutdown, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Book, BookId } from '../catalog/interfaces';
import { Member, MemberId } from '../roster/interfaces';
import { LibraryException } from '../shared/errors';
import { ArtifactName, LIBRARY_STORAGE, LibraryStorage } from './interfaces';
import { SEED_BOOKS, SEED_MEMBER_NAMES, seedContact } from './seed-data';
import { decodeBooks, decodeMembers, encodeBook, encodeMember } from './storage.codec';

/**
 * Next identifier after the highest numeric suffix in use.
 */
function nextId(prefix: string, existing: Iterable<string>): string {
    const pattern = new RegExp(`^${prefix}(\\d+)$`);
    let highest = 0;
    for (const id of existing) {
        const match = pattern.exec(id);
        if (match) {
            highest = Math.max(highest, Number(match[1]));
        }
    }
    return `${prefix}${String(highest + 1).padStart(4, '0')}`;
}

function indexBy<T, K>(items: T[], key: (item: T) => K, artifact: ArtifactName): Map<K, T> {
    const map = new Map<K, T>();
    for (const item of items) {
        const id = key(item);
        if (map.has(id)) {
            throw new LibraryException('MalformedStorage', `Malformed ${artifact} storage: duplicate id ${String(id)}`);
        }
        map.set(id, item);
    }
    return map;
}

/**
 * The process's catalog and roster state.
 *
 * Loaded (or seeded) once when the module initialises and saved in full after
 * every mutation and again at shutdown. Maps keep insertion order, which is
 * the listing order of books and members.
 */
@Injectable()
export class LibraryStore implements OnModuleInit, OnApplicationShutdown {
    private readonly logger = new Logger(LibraryStore.name);

    readonly books = new Map<BookId, Book>();
    readonly members = new Map<MemberId, Member>();

    private loaded = false;

    constructor(
        @Inject(LIBRARY_STORAGE) private readonly storage: LibraryStorage,
        private configService: ConfigService,
    ) { }

    async onModuleInit(): Promise<void> {
        await this.load();
    }

    async onApplicationShutdown(): Promise<void> {
        // Nothing to flush if startup failed before the state was read
        if (this.loaded) {
            await this.persist();
        }
    }

    /**
     * Replace in-memory state with the stored artifacts, seeding whichever
     * collection comes back empty.
     *
     * @throws LibraryException `MalformedStorage` when an artifact cannot be decoded
     */
    async load(): Promise<void> {
        const [bookContent, memberContent] = await Promise.all([
            this.storage.read('books'),
            this.storage.read('members'),
        ]);

        const books = bookContent.exists ? decodeBooks(bookContent.data) : [];
        const members = memberContent.exists ? decodeMembers(memberContent.data) : [];

        const bookIndex = indexBy(books, (book) => book.bookId, 'books');
        const memberIndex = indexBy(members, (member) => member.memberId, 'members');

        this.books.clear();
        this.members.clear();
        bookIndex.forEach((book, id) => this.books.set(id, book));
        memberIndex.forEach((member, id) => this.members.set(id, member));
        this.loaded = true;

        const seedEnabled = this.configService.get<boolean>('LIBRARY_SEED') ?? true;
        let seeded = false;
        if (seedEnabled && this.books.size === 0) {
            this.seedBooks();
            seeded = true;
        }
        if (seedEnabled && this.members.size === 0) {
            this.seedMembers();
            seeded = true;
        }
        if (seeded) {
            await this.persist();
        }

        this.logger.log({
            msg: 'Library loaded',
            books: this.books.size,
            members: this.members.size,
            seeded,
            files: [this.storage.describe('books'), this.storage.describe('members')],
        });
    }

    /**
     * Rewrite both artifacts from memory, books first.
     */
    async persist(): Promise<void> {
        try {
            await this.storage.write('books', [...this.books.values()].map(encodeBook));
            await this.storage.write('members', [...this.members.values()].map(encodeMember));
            this.logger.debug({ msg: 'Library saved', books: this.books.size, members: this.members.size });
        } catch (error) {
            this.logger.error({ msg: 'Saving library failed', error });
            throw error;
        }
    }

    /**
     * Book ids still listed in a member's borrowed books count as used, so a
     * removed book's id is never given to a new book.
     */
    nextBookId(): BookId {
        const mirrored = [...this.members.values()].flatMap((member) => member.borrowedBooks.map((entry) => entry.bookId));
        return nextId('B', [...this.books.keys(), ...mirrored]);
    }

    nextMemberId(): MemberId {
        const lentTo = [...this.books.values()].flatMap((book) => book.activeLoans.map((loan) => loan.memberId));
        return nextId('M', [...this.members.keys(), ...lentTo]);
    }

    private seedBooks(): void {
        for (const { title, author, copies } of SEED_BOOKS) {
            const bookId = this.nextBookId();
            this.books.set(bookId, { bookId, title, author, totalCopies: copies, activeLoans: [] });
        }
    }

    private seedMembers(): void {
        for (const name of SEED_MEMBER_NAMES) {
            const memberId = this.nextMemberId();
            this.members.set(memberId, { memberId, name, contact: seedContact(name), borrowedBooks: [] });
        }
    }
}
