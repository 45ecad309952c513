import { Response } from "express";

type ClosableResponse = Pick<Response, "writableFinished"> & {
  once(event: "close", listener: () => void): unknown;
};

/**
 * Signal that aborts when the client goes away before the response has
 * been written. Express responses emit "close" in both cases, so only an
 * unfinished response counts as a disconnect.
 */
export function abortOnClientDisconnect(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.once("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("client disconnected"));
    }
  });
  return controller.signal;
}
