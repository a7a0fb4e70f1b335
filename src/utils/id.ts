import { v4 as uuidv4 } from "uuid";

/**
 * Vote ids are random UUIDs; admins paste them back into /repremove,
 * so they must stay unique across restarts.
 */
export function newVoteId() {
    return uuidv4();
}
