/**
 * @fileoverview Catalog Interfaces
 */

import { CalendarDate } from '../../shared/dates';

/** Identifier of the form `B0001`. */
export type BookId = string;

/**
 * One copy of a book held by a member. Embedded in its book; has no id of
 * its own.
 */
export interface Loan {
    memberId: string;
    borrowDate: CalendarDate;
    dueDate: CalendarDate;
}

export interface Book {
    bookId: BookId;
    title: string;
    author: string;

    /** Number of lendable copies owned, at least 1 */
    totalCopies: number;

    /** Outstanding loans in borrow order */
    activeLoans: Loan[];
}

export function availableCopies(book: Book): number {
    return book.totalCopies - book.activeLoans.length;
}
