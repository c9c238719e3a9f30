/**
 * @fileoverview Roster Interfaces
 */

import { CalendarDate } from '../../shared/dates';

/** Identifier of the form `M0001`. */
export type MemberId = string;

/**
 * A member's view of one of its loans. Mirrors a {@link Loan} held by the
 * book it names.
 */
export interface BorrowedBook {
    bookId: string;
    borrowDate: CalendarDate;
    dueDate: CalendarDate;
}

export interface Member {
    memberId: MemberId;
    name: string;

    /** Free-form contact, usually an email address */
    contact: string;

    borrowedBooks: BorrowedBook[];
}
