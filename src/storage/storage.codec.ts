import { z } from 'zod';
import { Book } from '../catalog/interfaces';
import { Member } from '../roster/interfaces';
import { isCalendarDate } from '../shared/dates';
import { LibraryException } from '../shared/errors';
import { ArtifactName, BookRecord, MemberRecord } from './interfaces';

const calendarDate = z.string().refine(isCalendarDate, 'expected a YYYY-MM-DD date');

// Validation schemas for the on-disk artifacts
const LoanRecordSchema = z.object({
    member_id: z.string().min(1, 'member_id is required'),
    borrow_date: calendarDate,
    due_date: calendarDate,
});

const BookRecordSchema = z.object({
    book_id: z.string().min(1, 'book_id is required'),
    title: z.string(),
    author: z.string(),
    total_copies: z.number().int().positive(),
    borrowed_records: z.array(LoanRecordSchema).default([]),
}).superRefine((record, ctx) => {
    if (record.borrowed_records.length > record.total_copies) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['borrowed_records'],
            message: `${record.borrowed_records.length} loans for ${record.total_copies} copies`,
        });
    }
});

const BorrowedBookRecordSchema = z.object({
    book_id: z.string().min(1, 'book_id is required'),
    borrow_date: calendarDate,
    due_date: calendarDate,
});

const MemberRecordSchema = z.object({
    member_id: z.string().min(1, 'member_id is required'),
    name: z.string(),
    contact: z.string().default(''),
    borrowed_books: z.array(BorrowedBookRecordSchema).default([]),
});

function malformed(artifact: ArtifactName, error: z.ZodError): LibraryException {
    const errors = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    return new LibraryException('MalformedStorage', `Malformed ${artifact} storage: ${errors.join(', ')}`);
}

export function encodeBook(book: Book): BookRecord {
    return {
        book_id: book.bookId,
        title: book.title,
        author: book.author,
        total_copies: book.totalCopies,
        borrowed_records: book.activeLoans.map((loan) => ({
            member_id: loan.memberId,
            borrow_date: loan.borrowDate,
            due_date: loan.dueDate,
        })),
    };
}

export function encodeMember(member: Member): MemberRecord {
    return {
        member_id: member.memberId,
        name: member.name,
        contact: member.contact,
        borrowed_books: member.borrowedBooks.map((entry) => ({
            book_id: entry.bookId,
            borrow_date: entry.borrowDate,
            due_date: entry.dueDate,
        })),
    };
}

/**
 * Decode the books artifact.
 *
 * @throws LibraryException `MalformedStorage` on any schema or date violation
 */
export function decodeBooks(raw: unknown): Book[] {
    const result = z.array(BookRecordSchema).safeParse(raw);
    if (!result.success) {
        throw malformed('books', result.error);
    }
    return result.data.map((record) => ({
        bookId: record.book_id,
        title: record.title,
        author: record.author,
        totalCopies: record.total_copies,
        activeLoans: record.borrowed_records.map((loan) => ({
            memberId: loan.member_id,
            borrowDate: loan.borrow_date,
            dueDate: loan.due_date,
        })),
    }));
}

/**
 * Decode the members artifact.
 *
 * @throws LibraryException `MalformedStorage` on any schema or date violation
 */
export function decodeMembers(raw: unknown): Member[] {
    const result = z.array(MemberRecordSchema).safeParse(raw);
    if (!result.success) {
        throw malformed('members', result.error);
    }
    return result.data.map((record) => ({
        memberId: record.member_id,
        name: record.name,
        contact: record.contact,
        borrowedBooks: record.borrowed_books.map((entry) => ({
            bookId: entry.book_id,
            borrowDate: entry.borrow_date,
            dueDate: entry.due_date,
        })),
    }));
}
