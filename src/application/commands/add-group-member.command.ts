/**
 * Add Group Member Command
 * Assigns a single recipient to a group
 */

import { IRecipientRepository } from '../../domain/repositories/recipient-repository.interface';
import { GroupMembership, RecipientKind } from '../../domain/models/recipient';
import { NotFoundError, ValidationError } from '../../domain/errors';

export class AddGroupMemberCommand {
  constructor(
    private recipientRepository: IRecipientRepository,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Execute command
   *
   * A member already in another group moves to this one: the newest
   * membership is the effective one.
   *
   * @throws NotFoundError if the group or member does not exist
   * @throws ValidationError if the group is not a group or the member is not a single
   */
  async execute(group_id: string, member_id: string): Promise<GroupMembership> {
    if (!member_id || typeof member_id !== 'string') {
      throw new ValidationError('member_id is required');
    }

    const [group, member] = await Promise.all([
      this.recipientRepository.findById(group_id),
      this.recipientRepository.findById(member_id),
    ]);

    if (!group) {
      throw new NotFoundError(`Group ${group_id} not found`);
    }
    if (!member) {
      throw new NotFoundError(`Recipient ${member_id} not found`);
    }
    if (group.kind !== RecipientKind.GROUP) {
      throw new ValidationError(`${group.name} is not a group`);
    }
    if (member.kind !== RecipientKind.SINGLE) {
      throw new ValidationError(`${member.name} is a group and cannot be a member`);
    }

    const membership: GroupMembership = { group_id, member_id, created_at: this.clock() };
    await this.recipientRepository.addMembership(membership);
    console.log(`[Recipients] ${member.name} added to group ${group.name}`);
    return membership;
  }
}
