/**
 * @fileoverview Storage Record Interfaces
 *
 * On-disk shape of the two JSON artifacts. Field names are snake_case and
 * dates are `YYYY-MM-DD` strings.
 */

export interface LoanRecord {
    member_id: string;
    borrow_date: string;
    due_date: string;
}

export interface BookRecord {
    book_id: string;
    title: string;
    author: string;
    total_copies: number;
    borrowed_records: LoanRecord[];
}

export interface BorrowedBookRecord {
    book_id: string;
    borrow_date: string;
    due_date: string;
}

export interface MemberRecord {
    member_id: string;
    name: string;
    contact: string;
    borrowed_books: BorrowedBookRecord[];
}
