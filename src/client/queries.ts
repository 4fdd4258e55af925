const CUSTOMER_FIELDS = `
  id
  fullName
  email { email }
  status
  company { id name }
  createdAt { iso8601 }
  updatedAt { iso8601 }
`;

const THREAD_FIELDS = `
  id
  title
  status
  priority
  createdAt { iso8601 }
  updatedAt { iso8601 }
  labels { labelType { id name icon } }
  customer {
    id
    fullName
    email { email }
    company { id name }
  }
  assignedTo {
    ... on User { id fullName email publicName }
  }
`;

const PAGE_INFO = `pageInfo { hasNextPage endCursor }`;

export const THREADS = `
  query threads($first: Int!, $after: String, $statuses: [ThreadStatus!]) {
    threads(first: $first, after: $after, filters: { statuses: $statuses }) {
      edges { node { ${THREAD_FIELDS} } cursor }
      ${PAGE_INFO}
    }
  }
`;

// Ignored threads and spam are left out of reports.
export const THREADS_UPDATED_SINCE = `
  query threadsUpdatedSince($first: Int!, $after: String, $since: String) {
    threads(first: $first, after: $after, filters: {
      statuses: [TODO, SNOOZED, DONE]
      updatedAt: { after: $since }
      statusDetails: [
        CREATED,
        IN_PROGRESS,
        NEW_REPLY,
        THREAD_LINK_UPDATED,
        THREAD_DISCUSSION_RESOLVED,
        WAITING_FOR_CUSTOMER,
        WAITING_FOR_DURATION,
        DONE_MANUALLY_SET,
        DONE_AUTOMATICALLY_SET
      ]
      isMarkedAsSpam: false
    }) {
      edges { node { ${THREAD_FIELDS} } cursor }
      ${PAGE_INFO}
    }
  }
`;

export const THREAD = `
  query thread($threadId: ID!) {
    thread(threadId: $threadId) { ${THREAD_FIELDS} }
  }
`;

export const THREAD_WITH_TIMELINE = `
  query threadWithTimeline($threadId: ID!) {
    thread(threadId: $threadId) {
      ${THREAD_FIELDS}
      timelineEntries {
        edges {
          node {
            id
            timestamp { iso8601 }
            actor {
              ... on UserActor { user { id fullName email } }
              ... on CustomerActor { customer { id fullName email { email } } }
              ... on DeletedCustomerActor { customerId }
              ... on SystemActor { systemId }
              ... on MachineUserActor { machineUser { id fullName email } }
            }
            entry {
              ... on EmailEntry {
                emailId
                textContent
                from { name email }
                to { name email }
              }
              ... on ChatEntry { chatId chatText: text }
              ... on NoteEntry {
                noteId
                noteText: text
                markdown
                attachments { id fileName fileExtension fileMimeType type }
              }
              ... on ThreadAssignmentTransitionedEntry {
                previousAssignee { ... on User { id fullName email } }
                nextAssignee { ... on User { id fullName email } }
              }
              ... on ThreadStatusTransitionedEntry { previousStatus nextStatus }
              ... on ThreadPriorityChangedEntry { previousPriority nextPriority }
            }
          }
          cursor
        }
        ${PAGE_INFO}
      }
    }
  }
`;

export const CUSTOMERS = `
  query customers($first: Int!, $after: String) {
    customers(first: $first, after: $after) {
      edges { node { ${CUSTOMER_FIELDS} } cursor }
      ${PAGE_INFO}
    }
  }
`;

export const CUSTOMER_BY_EMAIL = `
  query customerByEmail($email: String!) {
    customerByEmail(email: $email) { ${CUSTOMER_FIELDS} }
  }
`;

export const SEARCH_CUSTOMERS = `
  query searchCustomers($query: String!, $first: Int!) {
    customers(first: $first, filters: { fullName: { contains: $query } }) {
      edges { node { ${CUSTOMER_FIELDS} } cursor }
      ${PAGE_INFO}
    }
  }
`;
