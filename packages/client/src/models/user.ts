export type PartialUser = {
  id: string;
  name: string | null;
};

export function partialUser(id: string, name?: string | null): PartialUser {
  return { id, name: name ?? null };
}
