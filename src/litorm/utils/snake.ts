// utils/snake.ts

/** "BookReview" -> "book_review", "HTTPRequest" -> "http_request" */
export function snake(name: string): string {
  return name
    .replace(/(.)([A-Z][a-z]+)/g, "$1_$2")
    .replace(/([a-z0-9])([A-Z])/g, "$1_$2")
    .toLowerCase();
}
