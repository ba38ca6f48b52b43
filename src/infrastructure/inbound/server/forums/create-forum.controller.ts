// Application
import { type CreateForumUseCase } from '../../../../application/use-cases/forums/create-forum.use-case.js';

import { CreateForumRequestHandler } from './create-forum-request.handler.js';
import { type ForumEnvelope, ForumResponsePresenter } from './forum-response.presenter.js';

/**
 * Orchestrates HTTP request handling for the create forum endpoint
 */
export class CreateForumController {
    private readonly requestHandler: CreateForumRequestHandler;
    private readonly responsePresenter: ForumResponsePresenter;

    constructor(private readonly createForumUseCase: CreateForumUseCase) {
        this.requestHandler = new CreateForumRequestHandler();
        this.responsePresenter = new ForumResponsePresenter();
    }

    async createForum(rawBody: string): Promise<{ body: ForumEnvelope; location: string }> {
        const details = this.requestHandler.handle(rawBody);

        const forum = await this.createForumUseCase.execute(details);

        return {
            body: this.responsePresenter.present(forum),
            location: this.responsePresenter.location(forum),
        };
    }
}
