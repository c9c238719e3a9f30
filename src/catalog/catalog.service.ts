import { Injectable, Logger } from '@nestjs/common';
import { LibraryStore } from '../storage/library.store';
import { fail, ok, Result } from '../shared/errors';
import { parseInput } from '../shared/validation';
import { AddBookDto, AddBookSchema } from './dto/add-book.dto';
import { availableCopies, Book, BookId } from './interfaces';

/** Copy handed to callers so loans can only change through the ledger. */
function snapshot(book: Book): Book {
    return { ...book, activeLoans: book.activeLoans.map((loan) => ({ ...loan })) };
}

@Injectable()
export class CatalogService {
    private readonly logger = new Logger(CatalogService.name);

    constructor(private store: LibraryStore) { }

    /**
     * Add a book with no loans and save.
     */
    async addBook(input: AddBookDto): Promise<Result<BookId>> {
        const parsed = parseInput(AddBookSchema, input);
        if (!parsed.ok) {
            this.logger.warn({ msg: 'Book rejected', error: parsed.error.message });
            return parsed;
        }

        const { title, author, totalCopies } = parsed.value;
        const bookId = this.store.nextBookId();
        this.store.books.set(bookId, { bookId, title, author, totalCopies, activeLoans: [] });
        await this.store.persist();

        this.logger.log({ msg: 'Book added', book_id: bookId, total_copies: totalCopies });
        return ok(bookId);
    }

    /**
     * Delete a book together with its loans. Members' borrowed lists are left
     * as they are.
     */
    async removeBook(bookId: BookId): Promise<Result<void>> {
        const book = this.store.books.get(bookId);
        if (!book) {
            return fail('NotFound', `Book ${bookId} not found`);
        }

        this.store.books.delete(bookId);
        await this.store.persist();

        if (book.activeLoans.length > 0) {
            this.logger.warn({
                msg: 'Book removed with active loans',
                book_id: bookId,
                loans: book.activeLoans.length,
            });
        } else {
            this.logger.log({ msg: 'Book removed', book_id: bookId });
        }
        return ok(undefined);
    }

    getBook(bookId: BookId): Result<Book> {
        const book = this.store.books.get(bookId);
        return book ? ok(snapshot(book)) : fail('NotFound', `Book ${bookId} not found`);
    }

    /**
     * Case-insensitive substring match on title or author, in catalog order.
     */
    searchBooks(keyword: string): Book[] {
        const needle = keyword.toLowerCase();
        return this.listBooks().filter(
            (book) => book.title.toLowerCase().includes(needle) || book.author.toLowerCase().includes(needle),
        );
    }

    listBooks(): Book[] {
        return [...this.store.books.values()].map(snapshot);
    }

    availableCopies(book: Book): number {
        return availableCopies(book);
    }
}
