import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { availableCopies } from '../catalog/interfaces';
import { BorrowedBook } from '../roster/interfaces';
import { CLOCK, Clock } from '../shared/clock';
import { addDays, toCalendarDate } from '../shared/dates';
import { fail, ok, Result } from '../shared/errors';
import { parseInput } from '../shared/validation';
import { LibraryStore } from '../storage/library.store';
import { LoanDaysSchema } from './dto/borrow.dto';
import {
    BorrowSummaryRow,
    ConsistencyIssue,
    LoanReceipt,
    ReturnReceipt,
} from './interfaces';

const DEFAULT_LOAN_DAYS = 14;

function pairKey(bookId: string, memberId: string): string {
    return `${bookId}\u0000${memberId}`;
}

/**
 * Borrow and return bookkeeping.
 *
 * A loan lives in two places: in the book's `activeLoans` and, mirrored, in
 * the member's `borrowedBooks`. This service is the only writer of either
 * list and always changes both before saving.
 */
@Injectable()
export class LendingService {
    private readonly logger = new Logger(LendingService.name);
    private readonly defaultLoanDays: number;

    constructor(
        private store: LibraryStore,
        private configService: ConfigService,
        @Inject(CLOCK) private readonly clock: Clock,
    ) {
        this.defaultLoanDays = this.configService.get<number>('LOAN_PERIOD_DAYS') ?? DEFAULT_LOAN_DAYS;
    }

    /**
     * Lend one copy of a book to a member, due `loanDays` after today.
     *
     * Fails without touching state when the member or book is unknown or no
     * copy is left. A member may hold several copies of the same book.
     */
    async borrow(memberId: string, bookId: string, loanDays = this.defaultLoanDays): Promise<Result<LoanReceipt>> {
        const days = parseInput(LoanDaysSchema, loanDays);
        if (!days.ok) {
            return days;
        }

        const member = this.store.members.get(memberId);
        if (!member) {
            return fail('NotFound', `Member ${memberId} not found`);
        }
        const book = this.store.books.get(bookId);
        if (!book) {
            return fail('NotFound', `Book ${bookId} not found`);
        }
        if (availableCopies(book) <= 0) {
            this.logger.log({ msg: 'Borrow refused, no copies left', book_id: bookId, member_id: memberId });
            return fail('NoCopiesAvailable', `No copies of ${bookId} available`);
        }

        const borrowDate = toCalendarDate(this.clock());
        const dueDate = addDays(borrowDate, days.value);

        book.activeLoans.push({ memberId, borrowDate, dueDate });
        member.borrowedBooks.push({ bookId, borrowDate, dueDate });
        await this.store.persist();

        this.logger.log({ msg: 'Book borrowed', book_id: bookId, member_id: memberId, due_date: dueDate });
        return ok({ bookId, memberId, borrowDate, dueDate });
    }

    /**
     * Release every loan the member holds on the book. Succeeds as a no-op
     * when there is nothing to release.
     */
    async returnBook(memberId: string, bookId: string): Promise<Result<ReturnReceipt>> {
        const member = this.store.members.get(memberId);
        if (!member) {
            return fail('NotFound', `Member ${memberId} not found`);
        }
        const book = this.store.books.get(bookId);
        if (!book) {
            return fail('NotFound', `Book ${bookId} not found`);
        }

        const before = book.activeLoans.length;
        book.activeLoans = book.activeLoans.filter((loan) => loan.memberId !== memberId);
        member.borrowedBooks = member.borrowedBooks.filter((entry) => entry.bookId !== bookId);
        const released = before - book.activeLoans.length;
        await this.store.persist();

        this.logger.log({ msg: 'Book returned', book_id: bookId, member_id: memberId, released });
        return ok({ bookId, memberId, released });
    }

    /**
     * The member's borrowed list, in borrow order.
     */
    memberLoans(memberId: string): Result<BorrowedBook[]> {
        const member = this.store.members.get(memberId);
        if (!member) {
            return fail('NotFound', `Member ${memberId} not found`);
        }
        return ok(member.borrowedBooks.map((entry) => ({ ...entry })));
    }

    borrowSummary(): BorrowSummaryRow[] {
        return [...this.store.members.values()].map((member) => ({
            memberId: member.memberId,
            name: member.name,
            borrowedCount: member.borrowedBooks.length,
        }));
    }

    /**
     * Compare every book's loans with the members' borrowed lists.
     * Read-only; an empty result means both views agree.
     */
    checkConsistency(): ConsistencyIssue[] {
        const issues: ConsistencyIssue[] = [];
        const loanCounts = new Map<string, number>();
        const mirrorCounts = new Map<string, number>();
        const pairs = new Map<string, { bookId: string; memberId: string }>();

        for (const book of this.store.books.values()) {
            for (const loan of book.activeLoans) {
                const key = pairKey(book.bookId, loan.memberId);
                loanCounts.set(key, (loanCounts.get(key) ?? 0) + 1);
                pairs.set(key, { bookId: book.bookId, memberId: loan.memberId });
            }
        }

        for (const member of this.store.members.values()) {
            for (const entry of member.borrowedBooks) {
                const key = pairKey(entry.bookId, member.memberId);
                mirrorCounts.set(key, (mirrorCounts.get(key) ?? 0) + 1);
                pairs.set(key, { bookId: entry.bookId, memberId: member.memberId });
            }
        }

        for (const [key, { bookId, memberId }] of pairs) {
            const loans = loanCounts.get(key) ?? 0;
            const mirrors = mirrorCounts.get(key) ?? 0;

            if (loans > 0 && !this.store.members.has(memberId)) {
                issues.push({
                    kind: 'loan-for-unknown-member',
                    bookId,
                    memberId,
                    detail: `${bookId} is lent to unknown member ${memberId}`,
                });
            } else if (loans > mirrors) {
                issues.push({
                    kind: 'loan-without-mirror',
                    bookId,
                    memberId,
                    detail: `${loans - mirrors} loan(s) of ${bookId} missing from ${memberId}'s borrowed books`,
                });
            } else if (mirrors > loans) {
                issues.push({
                    kind: 'mirror-without-loan',
                    bookId,
                    memberId,
                    detail: this.store.books.has(bookId)
                        ? `${memberId} lists ${mirrors - loans} loan(s) of ${bookId} the book does not hold`
                        : `${memberId} lists ${bookId}, which is no longer in the catalog`,
                });
            }
        }

        return issues;
    }
}
