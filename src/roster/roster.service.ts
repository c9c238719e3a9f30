import { Injectable, Logger } from '@nestjs/common';
import { LibraryStore } from '../storage/library.store';
import { fail, ok, Result } from '../shared/errors';
import { parseInput } from '../shared/validation';
import { AddMemberDto, AddMemberSchema } from './dto/add-member.dto';
import { Member, MemberId } from './interfaces';

function snapshot(member: Member): Member {
    return { ...member, borrowedBooks: member.borrowedBooks.map((entry) => ({ ...entry })) };
}

@Injectable()
export class RosterService {
    private readonly logger = new Logger(RosterService.name);

    constructor(private store: LibraryStore) { }

    async addMember(input: AddMemberDto): Promise<Result<MemberId>> {
        const parsed = parseInput(AddMemberSchema, input);
        if (!parsed.ok) {
            this.logger.warn({ msg: 'Member rejected', error: parsed.error.message });
            return parsed;
        }

        const { name, contact } = parsed.value;
        const memberId = this.store.nextMemberId();
        this.store.members.set(memberId, { memberId, name, contact, borrowedBooks: [] });
        await this.store.persist();

        this.logger.log({ msg: 'Member added', member_id: memberId });
        return ok(memberId);
    }

    listMembers(): Member[] {
        return [...this.store.members.values()].map(snapshot);
    }

    getMember(memberId: MemberId): Result<Member> {
        const member = this.store.members.get(memberId);
        return member ? ok(snapshot(member)) : fail('NotFound', `Member ${memberId} not found`);
    }

    borrowedCountByMember(memberId: MemberId): Result<number> {
        const member = this.store.members.get(memberId);
        return member ? ok(member.borrowedBooks.length) : fail('NotFound', `Member ${memberId} not found`);
    }
}
