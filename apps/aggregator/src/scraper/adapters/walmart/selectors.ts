/**
 * Walmart CSS Selectors
 *
 * Walmart serves several result layouts (grid, list, and a data-attribute
 * driven one); each selector lists them newest first.
 */

export const SELECTORS = {
  item: '[data-item-id], .search-result-gridview-item, [data-testid="list-view"]',

  title: 'a[link-identifier], .product-title-link, [data-automation-id="product-title"]',

  // Used when the title element carries no href
  link: 'a',

  price: '[data-automation-id="product-price"], .price-main .price-characteristic',

  image: 'img[data-testid="productTileImage"], .product-image img',
} as const
