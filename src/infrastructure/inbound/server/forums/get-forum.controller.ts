// Application
import { type GetForumUseCase } from '../../../../application/use-cases/forums/get-forum.use-case.js';

import { type ForumEnvelope, ForumResponsePresenter } from './forum-response.presenter.js';
import { GetForumRequestHandler } from './get-forum-request.handler.js';

/**
 * Orchestrates HTTP request handling for the show forum endpoint
 */
export class GetForumController {
    private readonly requestHandler: GetForumRequestHandler;
    private readonly responsePresenter: ForumResponsePresenter;

    constructor(private readonly getForumUseCase: GetForumUseCase) {
        this.requestHandler = new GetForumRequestHandler();
        this.responsePresenter = new ForumResponsePresenter();
    }

    async getForum(rawId: string): Promise<ForumEnvelope> {
        const id = this.requestHandler.handle(rawId);

        const forum = await this.getForumUseCase.execute(id);

        return this.responsePresenter.present(forum);
    }
}
