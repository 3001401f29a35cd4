/**
 * Stage 1: turns domain input into the exact payload an endpoint expects.
 * Must throw RequestValidationError on missing or malformed input, before anything is sent.
 */
export interface RequestComposer<I, Req> {
  compose(input: I): Req | Promise<Req>;
}

/**
 * Stage 2: one call to an external service. Fails with ServiceError on a non-success status.
 */
export interface ServiceClient<Req, Res> {
  readonly serviceName: string;
  send(request: Req): Promise<Res>;
}

/**
 * Stage 3: maps a response to an artifact. Deterministic for identical responses.
 */
export interface ResponsePresenter<Res, A> {
  present(response: Res): A;
}

export interface PipelineResult<Req, Res, A> {
  request: Readonly<Req>;
  response: Readonly<Res>;
  artifact: A;
}
