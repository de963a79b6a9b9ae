/**
 * coauthor.ts — Co-authored-by trailers for Pair Extraordinaire
 *
 * GitHub credits a co-author when the commit message ends with one
 * `Co-authored-by: Name <email>` trailer per person, separated from the body
 * by a blank line, and the commit lands in a merged pull request.
 */

import { InvalidCoauthorError } from "./errors.js";

export interface Coauthor {
  name: string;
  email: string;
}

export interface CommitMessageDraft {
  title: string;
  description?: string;
  coauthors: readonly Coauthor[];
}

const NOREPLY_DOMAIN = "users.noreply.github.com";

// Bot logins such as dependabot[bot] keep their brackets in no-reply addresses.
const EMAIL_PATTERN = /^[A-Za-z0-9._%+[\]-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/** App bots with public no-reply addresses; any of them can be credited. */
export const BOT_COAUTHORS: readonly Coauthor[] = Object.freeze([
  { name: "dependabot[bot]", email: `49699333+dependabot[bot]@${NOREPLY_DOMAIN}` },
  { name: "github-actions[bot]", email: `41898282+github-actions[bot]@${NOREPLY_DOMAIN}` },
  { name: "renovate[bot]", email: `29139614+renovate[bot]@${NOREPLY_DOMAIN}` },
  { name: "imgbot[bot]", email: `31427895+imgbot[bot]@${NOREPLY_DOMAIN}` },
]);

export function isValidCoauthorEmail(email: string): boolean {
  return EMAIL_PATTERN.test(email);
}

export function noreplyEmail(login: string, userId?: number | string): string {
  return userId === undefined ? `${login}@${NOREPLY_DOMAIN}` : `${userId}+${login}@${NOREPLY_DOMAIN}`;
}

export function coauthorTrailer(coauthor: Coauthor): string {
  const name = coauthor.name.trim();
  const label = `${coauthor.name} <${coauthor.email}>`;
  if (!name) throw new InvalidCoauthorError(label, "name is empty");
  if (/[<>\n]/.test(name)) throw new InvalidCoauthorError(label, "name may not contain <, > or line breaks");
  if (!isValidCoauthorEmail(coauthor.email)) {
    throw new InvalidCoauthorError(label, `"${coauthor.email}" is not an email address`);
  }
  return `Co-authored-by: ${name} <${coauthor.email}>`;
}

/** Parses the `Name <email>` form used on the command line. */
export function parseCoauthor(input: string): Coauthor {
  const match = /^(.+?)\s*<([^<>]+)>$/.exec(input.trim());
  if (!match) throw new InvalidCoauthorError(input, 'expected "Name <email>"');
  const coauthor = { name: match[1].trim(), email: match[2].trim() };
  coauthorTrailer(coauthor);
  return coauthor;
}

export function commitMessageWithCoauthors(draft: CommitMessageDraft): string {
  const title = draft.title.trim();
  if (!title) throw new Error("Commit title is empty");

  const parts = [title];
  const description = draft.description?.trim();
  if (description) parts.push("", description);
  if (draft.coauthors.length > 0) {
    parts.push("", ...draft.coauthors.map(coauthorTrailer));
  }
  return parts.join("\n");
}
