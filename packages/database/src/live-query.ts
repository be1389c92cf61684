import { DocumentChange, DocumentData, DocumentValue, QueryOptions, StoredDocument } from "./document-store";

export class LiveQueryWindow {
  private previous = new Map<string, StoredDocument>();

  diff(next: StoredDocument[], initial: boolean): DocumentChange[] {
    const changes: DocumentChange[] = [];
    const nextById = new Map<string, StoredDocument>();

    for (const doc of next) {
      nextById.set(doc.id, doc);
      const before = this.previous.get(doc.id);
      if (!before) {
        changes.push({ type: "added", doc });
      } else if (before.version !== doc.version) {
        changes.push({ type: "modified", doc });
      }
    }

    if (!initial) {
      for (const [id, doc] of this.previous) {
        if (!nextById.has(id)) changes.push({ type: "removed", doc });
      }
    }

    this.previous = nextById;
    return changes;
  }
}

export function matchesWhere(data: DocumentData, options: QueryOptions): boolean {
  for (const clause of options.where || []) {
    if (!(clause.field in data)) return false;
    if (data[clause.field] !== clause.value) return false;
  }
  if (options.orderBy && !(options.orderBy.field in data)) return false;
  return true;
}

function typeRank(value: DocumentValue): number {
  if (value === null) return 0;
  if (typeof value === "boolean") return 1;
  if (typeof value === "number") return 2;
  if (typeof value === "string") return 3;
  return 4;
}

export function compareValues(left: DocumentValue, right: DocumentValue): number {
  const rankDelta = typeRank(left) - typeRank(right);
  if (rankDelta !== 0) return rankDelta;
  if (typeof left === "number" && typeof right === "number") return left - right;
  if (typeof left === "string" && typeof right === "string") return left < right ? -1 : left > right ? 1 : 0;
  if (typeof left === "boolean" && typeof right === "boolean") return Number(left) - Number(right);
  return 0;
}

export function applyQuery(docs: StoredDocument[], options: QueryOptions): StoredDocument[] {
  const matched = docs.filter((doc) => matchesWhere(doc.data, options));
  const orderBy = options.orderBy;
  if (orderBy) {
    const direction = orderBy.direction === "desc" ? -1 : 1;
    matched.sort((a, b) => {
      const delta = compareValues(a.data[orderBy.field], b.data[orderBy.field]) * direction;
      return delta !== 0 ? delta : (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
    });
  }
  return options.limit !== undefined ? matched.slice(0, Math.max(0, options.limit)) : matched;
}
