// Domain
import { Forum, type ForumDetails, validateForum } from '../../../domain/entities/forum.entity.js';
import { StoreError } from '../../../domain/errors/store.error.js';
import { ValidationFailedError } from '../../../domain/errors/validation-failed.error.js';
import { Validator } from '../../../domain/validator/validator.js';

// Ports
import { type LoggerPort } from '../../ports/outbound/logging/logger.port.js';
import { type ForumRepositoryPort } from '../../ports/outbound/persistence/forum-repository.port.js';

/**
 * Validates a new forum listing and stores it
 */
export class CreateForumUseCase {
    constructor(
        private readonly forumRepository: ForumRepositoryPort,
        private readonly logger: LoggerPort,
    ) {}

    /**
     * @returns The stored forum, carrying its assigned id and version
     * @throws ValidationFailedError when any field rule fails
     * @throws StoreError when the insert fails
     */
    public async execute(details: ForumDetails): Promise<Forum> {
        const forum = new Forum(details);

        const validator = new Validator();
        validateForum(validator, forum);
        if (!validator.valid()) {
            throw new ValidationFailedError(validator.errors);
        }

        const result = await this.forumRepository.insert(forum);

        switch (result.status) {
            case 'ok':
                this.logger.info('Forum created', { id: result.value.id });
                return result.value;
            case 'store-error':
                throw new StoreError('insert', result.detail);
            default:
                throw new StoreError('insert', new Error(`Unexpected result: ${result.status}`));
        }
    }
}
