export const ACCOUNTS_QUERY = `
  query DiscoverAccounts($first: Int!, $after: String) {
    me {
      ... on PublicAPIClient {
        accounts(first: $first, after: $after) {
          pageInfo { hasNextPage endCursor }
          edges { node { id businessName } }
        }
      }
    }
  }
`;

/** Zones per location are not paged; locations hold far fewer than this. */
export const ZONES_PER_LOCATION = 100;

export const ACCOUNT_ZONES_QUERY = `
  query DiscoverAccountZones($accountId: ID!, $first: Int!, $after: String) {
    account(id: $accountId) {
      locations(first: $first, after: $after) {
        pageInfo { hasNextPage endCursor }
        edges {
          node {
            id
            soundZones(first: ${ZONES_PER_LOCATION}) {
              edges { node { id name isPaired } }
            }
          }
        }
      }
    }
  }
`;

export const ZONE_STATUS_QUERY = `
  query ZoneStatus($zoneId: ID!) {
    soundZone(id: $zoneId) {
      id
      name
      isPaired
      online
      device { id name }
      subscription { isActive }
    }
  }
`;
