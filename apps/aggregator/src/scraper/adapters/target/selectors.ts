/**
 * Target CSS Selectors
 *
 * Target renders results client-side; these match the server-rendered
 * product cards.
 */

export const SELECTORS = {
  item: '[data-test="@web/site-top-of-funnel/ProductCardWrapper"]',

  title: 'a[data-test="product-title"], .h-text-bs',

  link: 'a[data-test="product-title"], a',

  price: '[data-test="current-price"], .h-text-sm',

  image: 'img[data-test="product-image"]',
} as const
