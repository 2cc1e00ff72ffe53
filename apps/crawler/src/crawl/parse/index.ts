export { parseCount } from './count.js'
export { parsePostedAt } from './time.js'
export { parseItemUrl, type ItemUrl } from './url.js'
export { parseAudioInfo, type AudioInfo } from './audio.js'
export { compareItemIdentity, byIdentityDescending } from './identity.js'
export { parsed, unparsed, type ParseResult } from './result.js'
