import { Logger } from '../utils/Logger';
import { reportError } from '../errorhandler';
import { RequestComposer, ServiceClient, ResponsePresenter, PipelineResult } from './types';
import { deepFreeze } from './freeze';

export interface PipelineOptions {
  name?: string;
  logger?: Logger;
}

/**
 * Composer -> client -> presenter, strictly in sequence.
 *
 * Swapping the service or the output format only means passing a different stage. A failure in
 * any stage is reported and rethrown as is.
 */
export class Pipeline<I, Req, Res, A> {
  private readonly logger: Logger;

  constructor(
    private readonly composer: RequestComposer<I, Req>,
    private readonly client: ServiceClient<Req, Res>,
    private readonly presenter: ResponsePresenter<Res, A>,
    options: PipelineOptions = {}
  ) {
    this.logger = options.logger || new Logger(options.name || `${client.serviceName}Pipeline`);
  }

  async run(input: I): Promise<PipelineResult<Req, Res, A>> {
    try {
      const request = deepFreeze(await this.composer.compose(input));
      this.logger.debug('Request composed');

      const started = Date.now();
      const response = deepFreeze(await this.client.send(request));
      this.logger.info(`${this.client.serviceName} answered`, { durationMs: Date.now() - started });

      const artifact = this.presenter.present(response);
      return { request, response, artifact };
    } catch (error) {
      reportError(error, this.logger);
      throw error;
    }
  }
}
