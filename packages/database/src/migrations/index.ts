export type Migration = {
  id: string;
  up: string[];
  down: string[];
};

export const MIGRATIONS: Migration[] = [
  {
    id: "001_documents",
    up: [
      "create sequence if not exists document_versions",
      `
      create table if not exists documents (
        collection text not null,
        id text not null,
        data jsonb not null,
        version bigint not null,
        created_at timestamptz not null default now(),
        updated_at timestamptz not null default now(),
        primary key(collection, id)
      );
      `,
      `
      create or replace function notify_document_change() returns trigger as $$
      begin
        if tg_op = 'DELETE' then
          perform pg_notify('document_changes', json_build_object('collection', old.collection, 'id', old.id, 'op', tg_op)::text);
        else
          perform pg_notify('document_changes', json_build_object('collection', new.collection, 'id', new.id, 'op', tg_op)::text);
        end if;
        return null;
      end;
      $$ language plpgsql;
      `,
      "drop trigger if exists documents_notify on documents",
      "create trigger documents_notify after insert or update or delete on documents for each row execute function notify_document_change()",
    ],
    down: [
      "drop trigger if exists documents_notify on documents",
      "drop function if exists notify_document_change()",
      "drop table if exists documents",
      "drop sequence if exists document_versions",
    ],
  },
  {
    id: "002_order_indexes",
    up: [
      "create index if not exists idx_orders_user on documents ((data ->> 'userId')) where collection = 'orders'",
      "create index if not exists idx_orders_timestamp on documents ((data -> 'timestamp') desc) where collection = 'orders'",
      "create index if not exists idx_notifications_user on documents ((data ->> 'userId')) where collection = 'notifications'",
      "create index if not exists idx_admins_email on documents ((data ->> 'email')) where collection = 'admins'",
    ],
    down: [
      "drop index if exists idx_admins_email",
      "drop index if exists idx_notifications_user",
      "drop index if exists idx_orders_timestamp",
      "drop index if exists idx_orders_user",
    ],
  },
];
