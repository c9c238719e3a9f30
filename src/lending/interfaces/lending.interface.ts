/**
 * @fileoverview Lending Interfaces
 */

import { CalendarDate } from '../../shared/dates';

/**
 * Confirmation of a successful borrow.
 */
export interface LoanReceipt {
    bookId: string;
    memberId: string;
    borrowDate: CalendarDate;
    dueDate: CalendarDate;
}

export interface ReturnReceipt {
    bookId: string;
    memberId: string;

    /** Loans released; 0 when the member held none of this book */
    released: number;
}

/**
 * One row of the member-wise borrow summary.
 */
export interface BorrowSummaryRow {
    memberId: string;
    name: string;
    borrowedCount: number;
}

export type ConsistencyIssueKind =
    | 'loan-without-mirror'
    | 'mirror-without-loan'
    | 'loan-for-unknown-member';

/**
 * A break in the book-loans / member-borrowed-books pairing.
 */
export interface ConsistencyIssue {
    kind: ConsistencyIssueKind;
    bookId: string;
    memberId?: string;
    detail: string;
}
