/**
 * Capture file naming
 */

import { NamingError } from "../errors/index";

const DEFAULT_PORTS: Readonly<Record<string, string>> = {
  http: "80",
  https: "443",
  ws: "80",
  wss: "443",
  ftp: "21",
};

export const PATH_SEPARATOR_TOKEN = "_slash_";
export const QUERY_EQUALS_TOKEN = "_eq_";
export const QUERY_AND_TOKEN = "_";

/**
 * Turns a URL into an HTML file name that keeps as much of the URL readable
 * as possible, e.g. `https://shop.ro/ac/vrv?p=2` becomes
 * `https__shop.ro__443__slash_ac_slash_vrv__p_eq_2.html`.
 *
 * Distinct URLs can map to the same name (`/a/b` and `/a_slash_b`); that is
 * not detected.
 *
 * @throws NamingError for unparseable URLs and URLs with an opaque origin
 */
export function nameFor(url: string | URL): string {
  const raw = url.toString();
  let u: URL;
  try {
    u = typeof url === "string" ? new URL(url) : url;
  } catch {
    throw new NamingError(`Cannot parse URL: ${raw}`, "invalid-url", raw);
  }

  if (u.origin === "null") {
    throw new NamingError(
      `Cannot split URL into scheme, host and port, the origin is opaque: ${raw}`,
      "opaque-origin",
      raw,
    );
  }

  const scheme = u.protocol.replace(/:$/, "");
  const port = u.port || DEFAULT_PORTS[scheme] || "";
  const path = u.pathname.replaceAll("/", PATH_SEPARATOR_TOKEN);

  let name = `${scheme}__${u.hostname}__${port}_${path}`;
  // a bare trailing "?" still counts as a (empty) query
  const hasQuery = u.href.split("#")[0].includes("?");
  if (hasQuery) {
    const query = u.search
      .slice(1)
      .replaceAll("=", QUERY_EQUALS_TOKEN)
      .replaceAll("&", QUERY_AND_TOKEN);
    name += `__${query}`;
  }
  return `${name}.html`;
}
