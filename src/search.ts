import type { PostMatch, PostQuery, TagStackEntry } from "./types.js";
import { collapseWhitespace } from "./formatter.js";
import { parseAttributes } from "./tokenizer.js";
import { scanDocument, walkTags } from "./walker.js";

export class SearchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SearchError";
  }
}

interface UserScope {
  entry: TagStackEntry;
  id: string | null;
  name: string | null;
}

interface PostScope {
  entry: TagStackEntry;
  user: UserScope;
  body: string;
  topics: string[];
}

interface Scope {
  user: UserScope | null;
  post: PostScope | null;
}

function createMatcher(query: PostQuery): (post: PostScope) => boolean {
  const { word, topic } = query;
  if (word != null && topic != null) throw new SearchError("Search by word or by topic, not both");
  if (word != null) {
    if (!word) throw new SearchError("Search word must not be empty");
    return post => post.body.includes(word);
  }
  if (topic != null) {
    if (!topic) throw new SearchError("Search topic must not be empty");
    return post => post.topics.some(t => t.includes(topic));
  }
  throw new SearchError("Search needs a word or a topic");
}

/**
 * Posts whose body contains `word`, or with a topic containing `topic`, in
 * document order. Matching is case-sensitive. Only posts inside a `<user>` are
 * searched; a post belongs to its nearest enclosing user.
 */
export function searchPosts(input: string, query: PostQuery): PostMatch[] {
  const matches = createMatcher(query);
  const scopes = new Map<TagStackEntry, Scope>();
  const posts: PostScope[] = [];

  walkTags(scanDocument(String(input ?? "")).tokens, {
    onOpen(token, entry, parent) {
      const outer = parent ? scopes.get(parent) : undefined;
      let user = outer?.user ?? null;
      let post = outer?.post ?? null;
      if (token.name === "user") {
        user = { entry, id: parseAttributes(token.attributes).id?.trim() || null, name: null };
        post = null;
      } else if (token.name === "post" && user) {
        post = { entry, user, body: "", topics: [] };
        posts.push(post);
      }
      scopes.set(entry, { user, post });
    },
    onElement(el) {
      const scope = el.parent ? scopes.get(el.parent) : undefined;
      if (!scope) return;
      const text = collapseWhitespace(el.text);
      const { user, post } = scope;
      if (user && el.parent === user.entry) {
        if (el.entry.name === "id" && user.id === null && text) user.id = text;
        if (el.entry.name === "name" && user.name === null) user.name = text;
      }
      if (!post) return;
      if (el.entry.name === "body" && el.parent === post.entry) post.body = text;
      if (el.entry.name === "topic" && text) post.topics.push(text);
    }
  });

  return posts.filter(matches).map(post => ({
    userId: post.user.id,
    userName: post.user.name,
    body: post.body,
    topics: post.topics,
    line: post.entry.line
  }));
}
