/**
 * GraphQL query and mutation strings for Shopify Admin API.
 * Version: 2025-10
 */

/**
 * Metaobjects
 */
export const METAOBJECTS_BY_TYPE_QUERY = `
  query metaobjects($type: String!, $first: Int!, $after: String) {
    metaobjects(type: $type, first: $first, after: $after) {
      edges {
        node {
          id
          type
          handle
          displayName
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const METAOBJECT_CREATE = `
  mutation metaobjectCreate($metaobject: MetaobjectCreateInput!) {
    metaobjectCreate(metaobject: $metaobject) {
      metaobject {
        id
        handle
        type
        displayName
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

export const METAOBJECT_UPDATE = `
  mutation metaobjectUpdate($id: ID!, $metaobject: MetaobjectUpdateInput!) {
    metaobjectUpdate(id: $id, metaobject: $metaobject) {
      metaobject {
        id
        handle
        type
        displayName
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

export const METAOBJECT_UPSERT = `
  mutation metaobjectUpsert($handle: MetaobjectHandleInput!, $metaobject: MetaobjectUpsertInput!) {
    metaobjectUpsert(handle: $handle, metaobject: $metaobject) {
      metaobject {
        id
        handle
        type
        displayName
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

/**
 * Metafields Set (Batch Upsert)
 */
export const METAFIELDS_SET = `
  mutation metafieldsSet($metafields: [MetafieldsSetInput!]!) {
    metafieldsSet(metafields: $metafields) {
      metafields {
        id
        namespace
        key
        value
        ownerType
      }
      userErrors {
        field
        message
        code
      }
    }
  }
`;

/**
 * Product Category
 */
export const PRODUCT_UPDATE_CATEGORY = `
  mutation productUpdateCategory($product: ProductUpdateInput!) {
    productUpdate(product: $product) {
      product {
        id
        category {
          id
          name
        }
      }
      userErrors {
        field
        message
      }
    }
  }
`;

/**
 * Collections
 */
export const COLLECTIONS_BY_TITLE_QUERY = `
  query collectionsByTitle($query: String!, $first: Int!, $after: String) {
    collections(query: $query, first: $first, after: $after) {
      edges {
        node {
          id
          title
          handle
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

export const COLLECTION_ADD_PRODUCTS = `
  mutation collectionAddProducts($id: ID!, $productIds: [ID!]!) {
    collectionAddProducts(id: $id, productIds: $productIds) {
      collection {
        id
        title
      }
      userErrors {
        field
        message
      }
    }
  }
`;
