/**
 * @fileoverview Library Console Commands
 *
 * Commands:
 *   library books                                   - List the catalog
 *   library members                                 - List the roster
 *   library add-book <title> <author> [--copies n]  - Add a book
 *   library add-member <name> <contact>             - Add a member
 *   library borrow <memberId> <bookId> [--days n]   - Lend a copy
 *   library return <memberId> <bookId>              - Return a member's copies
 *   library search <keyword>                        - Search title and author
 *   library remove-book <bookId>                    - Delete a book
 *   library member-books <memberId>                 - A member's borrowed books
 *   library summary                                 - Borrow counts per member
 *   library save                                    - Rewrite the storage files
 *   library check                                   - Report loan/roster mismatches
 *
 * The runner only parses arguments and renders results; every rule lives in
 * the catalog, roster and lending services.
 */

import { Injectable } from '@nestjs/common';
import { parseArgs } from 'node:util';
import { CatalogService } from '../catalog/catalog.service';
import { availableCopies } from '../catalog/interfaces';
import { LendingService } from '../lending/lending.service';
import { RosterService } from '../roster/roster.service';
import { Result } from '../shared/errors';
import { LibraryStore } from '../storage/library.store';
import { formatFailure, formatTable } from './format';

export interface CliOutput {
    out(line: string): void;
    err(line: string): void;
}

export const CONSOLE_OUTPUT: CliOutput = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

const USAGE = [
    'Usage: library <command> [arguments]',
    '',
    'Commands:',
    '  books                                  List the catalog',
    '  members                                List the roster',
    '  add-book <title> <author> [--copies n] Add a book (1 copy by default)',
    '  add-member <name> <contact>            Add a member',
    '  borrow <memberId> <bookId> [--days n]  Lend a copy',
    '  return <memberId> <bookId>             Return the member\'s copies of a book',
    '  search <keyword>                       Search titles and authors',
    '  remove-book <bookId>                   Delete a book',
    '  member-books <memberId>                List a member\'s borrowed books',
    '  summary                                Borrowed-book count per member',
    '  save                                   Rewrite the storage files',
    '  check                                  Report loan/roster mismatches',
];

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function requireArgs(positionals: string[], count: number, usage: string): string[] {
    if (positionals.length < count) {
        throw new UsageError(`Usage: library ${usage}`);
    }
    return positionals.slice(0, count);
}

function toNumber(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

@Injectable()
export class LibraryCli {
    constructor(
        private catalog: CatalogService,
        private roster: RosterService,
        private lending: LendingService,
        private store: LibraryStore,
    ) { }

    /**
     * Run one command and return the process exit code.
     */
    async run(argv: string[], output: CliOutput = CONSOLE_OUTPUT): Promise<number> {
        let command: string | undefined;
        let positionals: string[] = [];
        let copies: string | undefined;
        let days: string | undefined;

        try {
            const parsed = parseArgs({
                args: argv,
                options: {
                    copies: { type: 'string' },
                    days: { type: 'string' },
                },
                allowPositionals: true,
                strict: true,
            });
            [command, ...positionals] = parsed.positionals;
            ({ copies, days } = parsed.values);
        } catch (error) {
            output.err(error instanceof Error ? error.message : String(error));
            return EXIT_USAGE;
        }

        try {
            return await this.dispatch(command, positionals, { copies, days }, output);
        } catch (error) {
            if (error instanceof UsageError) {
                output.err(error.message);
                return EXIT_USAGE;
            }
            throw error;
        }
    }

    private async dispatch(
        command: string | undefined,
        args: string[],
        options: { copies?: string; days?: string },
        output: CliOutput,
    ): Promise<number> {
        switch (command) {
            case 'books':
                return this.books(output);
            case 'members':
                return this.members(output);
            case 'add-book': {
                const [title, author] = requireArgs(args, 2, 'add-book <title> <author> [--copies n]');
                const result = await this.catalog.addBook({ title, author, totalCopies: toNumber(options.copies) });
                return this.report(result, output, (bookId) => `Added ${bookId}: ${title.trim()}.`);
            }
            case 'add-member': {
                const [name, contact] = requireArgs(args, 2, 'add-member <name> <contact>');
                const result = await this.roster.addMember({ name, contact });
                return this.report(result, output, (memberId) => `Added ${memberId}: ${name.trim()}.`);
            }
            case 'borrow': {
                const [memberId, bookId] = requireArgs(args, 2, 'borrow <memberId> <bookId> [--days n]');
                const result = await this.lending.borrow(memberId, bookId, toNumber(options.days));
                return this.report(result, output, (loan) => `${loan.bookId} borrowed by ${loan.memberId}, due ${loan.dueDate}.`);
            }
            case 'return': {
                const [memberId, bookId] = requireArgs(args, 2, 'return <memberId> <bookId>');
                const result = await this.lending.returnBook(memberId, bookId);
                return this.report(result, output, ({ released }) =>
                    released === 0
                        ? `${memberId} holds no copy of ${bookId}; nothing to return.`
                        : `${bookId} returned by ${memberId} (${released} cop${released === 1 ? 'y' : 'ies'}).`,
                );
            }
            case 'search': {
                const [keyword] = requireArgs(args, 1, 'search <keyword>');
                return this.search(keyword, output);
            }
            case 'remove-book': {
                const [bookId] = requireArgs(args, 1, 'remove-book <bookId>');
                const result = await this.catalog.removeBook(bookId);
                return this.report(result, output, () => `Removed ${bookId}.`);
            }
            case 'member-books': {
                const [memberId] = requireArgs(args, 1, 'member-books <memberId>');
                return this.memberBooks(memberId, output);
            }
            case 'summary': {
                const rows = this.lending.borrowSummary().map((row) => [row.memberId, row.name, row.borrowedCount]);
                formatTable(['MemberID', 'Name', 'Borrowed'], rows).forEach((line) => output.out(line));
                return EXIT_OK;
            }
            case 'save':
                await this.store.persist();
                output.out('Library saved.');
                return EXIT_OK;
            case 'check':
                return this.check(output);
            case undefined:
            case 'help':
                USAGE.forEach((line) => output.out(line));
                return EXIT_OK;
            default:
                output.err(`Unknown command: ${command}`);
                USAGE.forEach((line) => output.err(line));
                return EXIT_USAGE;
        }
    }

    private report<T>(result: Result<T>, output: CliOutput, describe: (value: T) => string): number {
        if (!result.ok) {
            output.err(formatFailure(result.error));
            return EXIT_FAILED;
        }
        output.out(describe(result.value));
        return EXIT_OK;
    }

    private books(output: CliOutput): number {
        const rows = this.catalog.listBooks().map((book) => [
            book.bookId,
            book.title,
            book.author,
            availableCopies(book),
            book.totalCopies,
        ]);
        formatTable(['BookID', 'Title', 'Author', 'Avail', 'Total'], rows).forEach((line) => output.out(line));
        return EXIT_OK;
    }

    private members(output: CliOutput): number {
        const rows = this.roster.listMembers().map((member) => [member.memberId, member.name, member.contact]);
        formatTable(['MemberID', 'Name', 'Contact'], rows).forEach((line) => output.out(line));
        return EXIT_OK;
    }

    private search(keyword: string, output: CliOutput): number {
        const matches = this.catalog.searchBooks(keyword);
        if (matches.length === 0) {
            output.out(`No books match "${keyword}".`);
            return EXIT_OK;
        }
        for (const book of matches) {
            output.out(`${book.bookId} - ${book.title} by ${book.author} (Available: ${availableCopies(book)})`);
        }
        return EXIT_OK;
    }

    private memberBooks(memberId: string, output: CliOutput): number {
        const member = this.roster.getMember(memberId);
        if (!member.ok) {
            output.err(formatFailure(member.error));
            return EXIT_FAILED;
        }
        const loans = this.lending.memberLoans(memberId);
        if (!loans.ok) {
            output.err(formatFailure(loans.error));
            return EXIT_FAILED;
        }

        output.out(`Books borrowed by ${member.value.name} (${memberId}):`);
        if (loans.value.length === 0) {
            output.out('No books borrowed.');
            return EXIT_OK;
        }
        for (const entry of loans.value) {
            output.out(`BookID: ${entry.bookId} | Borrowed: ${entry.borrowDate} | Due: ${entry.dueDate}`);
        }
        return EXIT_OK;
    }

    private check(output: CliOutput): number {
        const issues = this.lending.checkConsistency();
        if (issues.length === 0) {
            output.out('No consistency issues.');
            return EXIT_OK;
        }
        for (const issue of issues) {
            output.out(`[${issue.kind}] ${issue.detail}`);
        }
        return EXIT_FAILED;
    }
}
