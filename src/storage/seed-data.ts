/**
 * Demonstration records created on first run, when storage is empty.
 */

export const SEED_BOOKS: ReadonlyArray<{ title: string; author: string; copies: number }> = [
    { title: 'Python Basics', author: 'John Smith', copies: 4 },
    { title: 'Data Structures', author: 'Mark Allen', copies: 3 },
    { title: 'AI Fundamentals', author: 'Andrew Ng', copies: 2 },
    { title: 'Machine Learning', author: 'Tom Mitchell', copies: 5 },
    { title: 'Cybersecurity 101', author: 'Jane Doe', copies: 3 },
    { title: 'Database Systems', author: 'Ramakrishnan', copies: 2 },
    { title: 'Java Programming', author: 'James Gosling', copies: 3 },
    { title: 'Operating Systems', author: 'Silberschatz', copies: 2 },
    { title: 'Networks Explained', author: 'Tanenbaum', copies: 2 },
    { title: 'Cloud Computing', author: 'Rajkumar Buyya', copies: 3 },
];

export const SEED_MEMBER_NAMES: ReadonlyArray<string> = [
    'Alice Carter',
    'Bruno Silva',
    'Chen Wei',
    'Dana Okafor',
    'Elif Demir',
    'Farah Haddad',
    'Gustav Lind',
    'Hana Sato',
    'Ivan Petrov',
    'Julia Moreau',
    'Kofi Mensah',
    'Lena Vogel',
];

/** `Alice Carter` -> `alice@example.com` */
export function seedContact(name: string): string {
    return `${name.split(' ')[0].toLowerCase()}@example.com`;
}
