/**
 * eBay CSS Selectors
 *
 * Covers the current `.s-item` result grid and the older `.lvresult` list
 * layout still served to some locales.
 */

export const SELECTORS = {
  // Search result block
  item: '.s-item, .lvresult',

  // "SPONSORED" / "NEW LISTING" tag rendered inside promoted blocks
  sponsoredTag: '.s-item__title--tag',

  title: '.s-item__title, .lvtitle a',

  // Link to the listing (the legacy layout links the title itself)
  link: '.s-item__link, .lvtitle a',

  price: '.s-item__price, .lvprice .prc',

  image: '.s-item__image-img, img.img',
} as const

/** First grid slot is a "Shop on eBay" placeholder, not a listing */
export const PLACEHOLDER_TITLE = 'Shop on eBay'
