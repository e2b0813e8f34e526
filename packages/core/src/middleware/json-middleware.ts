import type { Middleware, Pipe } from "../models/handlers";
import { jsonBody } from "../models/body";
import { parseJson } from "../json/json";
import type { JsonElement } from "../json/json-element";
import type ClientCall from "../client/client-call";
import type ClientPipeline from "../client/client-pipeline";
import { toError } from "../utils/errors";

const JSON_CONTENT_TYPE = /^(?:application|text)\/(?:x-)?json/i;

export const JSON_REQUEST_CONTENT_TYPE = "application/json; charset=utf-8";

export interface JsonMiddlewareOptions {
  /** Label JSON request bodies with a JSON content type. Defaults to true. */
  request?: boolean;
  /** Parse JSON response bodies. Defaults to true. */
  response?: boolean;
}

/**
 * Parses text responses whose content type is JSON into a JSON body, and
 * labels outgoing JSON bodies. A syntax error aborts the call with a
 * `JsonParseError`.
 *
 * The pipes are created once per middleware, and both skip bodies they
 * already handled, so injecting the same middleware twice runs them twice
 * with no further effect.
 */
export function jsonMiddleware(
  options: JsonMiddlewareOptions = {}
): Middleware<ClientPipeline> {
  const { request = true, response = true } = options;
  return (pipeline) => {
    if (request) {
      pipeline.peek(labelRequest);
    }
    if (response) {
      pipeline.receivedPipe(parseResponse);
    }
  };
}

function labelRequest(call: ClientCall): void {
  const { request } = call;
  if (request.body.type === "json" && !("content-type" in request.headers)) {
    request.headers["content-type"] = JSON_REQUEST_CONTENT_TYPE;
  }
}

const parseResponse: Pipe<ClientCall> = (call, next) => {
  const response = call.response;
  if (response === undefined) {
    next();
    return;
  }
  const body = response.body;
  const contentType = response.headers["content-type"] ?? "";
  if (body.type !== "text" || !JSON_CONTENT_TYPE.test(contentType)) {
    next();
    return;
  }

  let json: JsonElement;
  try {
    json = parseJson(body.text);
  } catch (error) {
    next(toError(error));
    return;
  }
  response.body = jsonBody(json);
  next();
};
