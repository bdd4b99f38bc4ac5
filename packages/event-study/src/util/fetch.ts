/** The subset of global `fetch` the sources use; tests pass an in-process stand-in. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>
