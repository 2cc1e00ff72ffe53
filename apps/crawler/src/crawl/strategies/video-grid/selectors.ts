/**
 * Video grid CSS selectors
 *
 * Account page with a grid of video cards; each card opens a detail overlay
 * with its own URL and a close button. Swap this manifest when the markup changes.
 */

export const SELECTORS = {
  // Account page
  userPage: "[data-e2e='user-page']",
  errorTitle: "div[class*='-DivErrorContainer'] p[class*='-PTitle']",
  displayName: "[data-e2e='user-subtitle']",
  followerCount: "strong[data-e2e='followers-count']",

  // Grid cards (card-relative selectors below)
  card: "div[data-e2e='user-post-item']",
  cardLink: 'a',
  cardThumbnail: 'img',
  cardViews: "[data-e2e='video-views']",

  // Detail overlay
  title: "[data-e2e='browse-video-desc'], [data-e2e='video-desc']",
  postedAt: "[data-e2e='browser-nickname'] span:last-child",
  audio: "[data-e2e='browse-music'], [data-e2e='video-music']",
  likeCount: "strong[data-e2e='browse-like-count'], strong[data-e2e='like-count']",
  comment: "div[class*='DivCommentItemContainer']",
  commentAuthor: "[data-e2e='comment-username-1']",
  commentText: "[data-e2e='comment-level-1']",
  commentLikes: "[data-e2e='comment-like-count']",
  close: "[data-e2e='browse-close']",

  // Signed-in header
  profileIcon: "[data-e2e='profile-icon']",
} as const

/**
 * Error titles of the "account not found" page.
 */
export const MISSING_ACCOUNT_TEXT = [
  'このアカウントは見つかりませんでした',
  "Couldn't find this account",
] as const
