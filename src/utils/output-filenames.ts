import { padPageNumber } from "./string";
import type { PageFilenames } from "../types";

/**
 * Filenames of a page and its neighbours
 * The first page has no previous page and the last no next page ("")
 *
 * @example
 * outputFilenames("page", 2, 3)
 * // { filename: "page-002.html", prevPage: "page-001.html", nextPage: "page-003.html" }
 */
export function outputFilenames(
  baseName: string,
  num: number,
  totalPages: number,
): PageFilenames {
  const name = (n: number) => `${baseName}-${padPageNumber(n)}.html`;
  return {
    filename: name(num),
    prevPage: num === 1 ? "" : name(num - 1),
    nextPage: num === totalPages ? "" : name(num + 1),
  };
}
