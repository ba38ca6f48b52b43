// Domain
import { type Forum } from '../../../domain/entities/forum.entity.js';
import { RecordNotFoundError } from '../../../domain/errors/record-not-found.error.js';
import { StoreError } from '../../../domain/errors/store.error.js';

// Ports
import { type ForumRepositoryPort } from '../../ports/outbound/persistence/forum-repository.port.js';

export class GetForumUseCase {
    constructor(private readonly forumRepository: ForumRepositoryPort) {}

    public async execute(id: number): Promise<Forum> {
        const result = await this.forumRepository.get(id);

        switch (result.status) {
            case 'ok':
                return result.value;
            case 'not-found':
                throw new RecordNotFoundError('Forum', id);
            case 'store-error':
                throw new StoreError('get', result.detail);
            case 'edit-conflict':
                throw new StoreError('get', new Error('Unexpected edit conflict on read'));
        }
    }
}
