/**
 * AliExpress CSS Selectors
 *
 * Class names on AliExpress are hashed per deploy, so the price selector
 * ends with a substring match on "price".
 */

export const SELECTORS = {
  item: '[data-product-id], .list-item',

  // The full product name is usually only in the title attribute
  title: 'a[title], .title a, h1',

  link: 'a',

  price: '.price-current, .mGXnE_item, [class*="price"]',

  image: 'img',
} as const
