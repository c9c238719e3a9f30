import { createLibrary, LibraryFixture } from '../../test/support/library.fixture';
import { formatTable } from './format';
import { CliOutput, EXIT_FAILED, EXIT_OK, EXIT_USAGE, LibraryCli } from './library.cli';

describe('LibraryCli', () => {
    let library: LibraryFixture;
    let cli: LibraryCli;
    let out: string[];
    let err: string[];
    let output: CliOutput;

    const run = (...argv: string[]) => cli.run(argv, output);

    beforeEach(async () => {
        library = await createLibrary();
        cli = new LibraryCli(library.catalog, library.roster, library.lending, library.store);
        out = [];
        err = [];
        output = { out: (line) => out.push(line), err: (line) => err.push(line) };

        await library.catalog.addBook({ title: 'Python Basics', author: 'John Smith', totalCopies: 2 });
        await library.catalog.addBook({ title: 'Compilers', author: 'Alfred Aho', totalCopies: 1 });
        await library.roster.addMember({ name: 'Alice Carter', contact: 'alice@example.com' });
        await library.roster.addMember({ name: 'Bruno Silva', contact: 'bruno@example.com' });
    });

    describe('listing', () => {
        it('should print the catalog with availability', async () => {
            await library.lending.borrow('M0001', 'B0001');

            await expect(run('books')).resolves.toBe(EXIT_OK);

            expect(out).toEqual([
                'BookID | Title         | Author     | Avail | Total',
                '---------------------------------------------------',
                'B0001  | Python Basics | John Smith | 1     | 2',
                'B0002  | Compilers     | Alfred Aho | 1     | 1',
            ]);
        });

        it('should print the roster', async () => {
            await run('members');

            expect(out).toEqual([
                'MemberID | Name         | Contact',
                '-------------------------------------------',
                'M0001    | Alice Carter | alice@example.com',
                'M0002    | Bruno Silva  | bruno@example.com',
            ]);
        });

        it('should print the borrow summary', async () => {
            await library.lending.borrow('M0001', 'B0002');

            await run('summary');

            expect(out).toEqual([
                'MemberID | Name         | Borrowed',
                '----------------------------------',
                'M0001    | Alice Carter | 1',
                'M0002    | Bruno Silva  | 0',
            ]);
        });
    });

    describe('adding', () => {
        it('should add a book with a copy count', async () => {
            await expect(run('add-book', 'Algorithms', 'Robert Sedgewick', '--copies', '3')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['Added B0003: Algorithms.']);
            const book = library.catalog.getBook('B0003');
            expect(book.ok && book.value.totalCopies).toBe(3);
        });

        it('should report an unparseable copy count as an invalid argument', async () => {
            await expect(run('add-book', 'Algorithms', 'Robert Sedgewick', '--copies', 'many')).resolves.toBe(EXIT_FAILED);

            expect(err).toHaveLength(1);
            expect(err[0].startsWith('Error [InvalidArgument]: totalCopies:')).toBe(true);
        });

        it('should add a member', async () => {
            await expect(run('add-member', 'Chen Wei', 'chen@example.com')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['Added M0003: Chen Wei.']);
        });
    });

    describe('lending', () => {
        it('should borrow and print the due date', async () => {
            await expect(run('borrow', 'M0002', 'B0001', '--days', '7')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['B0001 borrowed by M0002, due 2026-03-08.']);
        });

        it('should print failures on stderr', async () => {
            await run('borrow', 'M0001', 'B0002');

            await expect(run('borrow', 'M0002', 'B0002')).resolves.toBe(EXIT_FAILED);

            expect(err).toEqual(['Error [NoCopiesAvailable]: No copies of B0002 available']);
        });

        it('should return a borrowed book', async () => {
            await run('borrow', 'M0001', 'B0001');
            out.length = 0;

            await expect(run('return', 'M0001', 'B0001')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['B0001 returned by M0001 (1 copy).']);
        });

        it('should say when there was nothing to return', async () => {
            await expect(run('return', 'M0002', 'B0001')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['M0002 holds no copy of B0001; nothing to return.']);
        });

        it('should list a member\'s borrowed books', async () => {
            await run('borrow', 'M0001', 'B0002');
            out.length = 0;

            await run('member-books', 'M0001');

            expect(out).toEqual([
                'Books borrowed by Alice Carter (M0001):',
                'BookID: B0002 | Borrowed: 2026-03-01 | Due: 2026-03-15',
            ]);
        });

        it('should say when a member has borrowed nothing', async () => {
            await run('member-books', 'M0002');

            expect(out).toEqual(['Books borrowed by Bruno Silva (M0002):', 'No books borrowed.']);
        });

        it('should report an unknown member for member-books', async () => {
            await expect(run('member-books', 'M0404')).resolves.toBe(EXIT_FAILED);

            expect(err).toEqual(['Error [NotFound]: Member M0404 not found']);
        });
    });

    describe('catalog maintenance', () => {
        it('should search titles and authors', async () => {
            await run('search', 'python');

            expect(out).toEqual(['B0001 - Python Basics by John Smith (Available: 2)']);
        });

        it('should say when nothing matches', async () => {
            await run('search', 'nomatch');

            expect(out).toEqual(['No books match "nomatch".']);
        });

        it('should remove a book', async () => {
            await expect(run('remove-book', 'B0002')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['Removed B0002.']);
        });

        it('should report removing an unknown book', async () => {
            await expect(run('remove-book', 'B0099')).resolves.toBe(EXIT_FAILED);

            expect(err).toEqual(['Error [NotFound]: Book B0099 not found']);
            expect(library.catalog.listBooks()).toHaveLength(2);
        });

        it('should save on request', async () => {
            const writesBefore = library.storage.writes.length;

            await expect(run('save')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['Library saved.']);
            expect(library.storage.writes.slice(writesBefore)).toEqual(['books', 'members']);
        });

        it('should report consistency issues with a failing exit code', async () => {
            await run('borrow', 'M0001', 'B0002');
            await run('remove-book', 'B0002');
            out.length = 0;

            await expect(run('check')).resolves.toBe(EXIT_FAILED);

            expect(out).toEqual(['[mirror-without-loan] M0001 lists B0002, which is no longer in the catalog']);
        });

        it('should pass the check on a consistent library', async () => {
            await expect(run('check')).resolves.toBe(EXIT_OK);

            expect(out).toEqual(['No consistency issues.']);
        });
    });

    describe('usage', () => {
        it('should print usage for missing arguments', async () => {
            await expect(run('borrow', 'M0001')).resolves.toBe(EXIT_USAGE);

            expect(err).toEqual(['Usage: library borrow <memberId> <bookId> [--days n]']);
        });

        it('should reject unknown options', async () => {
            await expect(run('books', '--verbose')).resolves.toBe(EXIT_USAGE);

            expect(err).toHaveLength(1);
        });

        it('should reject unknown commands', async () => {
            await expect(run('lend')).resolves.toBe(EXIT_USAGE);

            expect(err[0]).toBe('Unknown command: lend');
        });

        it('should print help without a command', async () => {
            await expect(run()).resolves.toBe(EXIT_OK);

            expect(out[0]).toBe('Usage: library <command> [arguments]');
        });
    });
});

describe('formatTable', () => {
    it('should size columns to the widest cell', () => {
        expect(formatTable(['Id', 'Name'], [['M0001', 'Li'], ['M0002', 'Alexandra']])).toEqual([
            'Id    | Name',
            '-----------------',
            'M0001 | Li',
            'M0002 | Alexandra',
        ]);
    });

    it('should print only the header for no rows', () => {
        expect(formatTable(['Id', 'Name'], [])).toEqual(['Id | Name', '---------']);
    });
});
