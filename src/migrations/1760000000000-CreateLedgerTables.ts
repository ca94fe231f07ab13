import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Organizations, accounts, attachment references, orders with their
 * deliveries, and the audit trail.
 */
export class CreateLedgerTables1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
    await queryRunner.query(
      `CREATE TYPE "users_role_enum" AS ENUM ('superadmin', 'admin', 'staff')`,
    );
    await queryRunner.query(
      `CREATE TYPE "orders_status_enum" AS ENUM ('Pending', 'Completed')`,
    );
    await queryRunner.query(
      `CREATE TYPE "attachments_content_kind_enum" AS ENUM ('raw', 'image')`,
    );
    await queryRunner.query(
      `CREATE TYPE "audit_logs_action_enum" AS ENUM ('create', 'update', 'delete', 'login')`,
    );

    await queryRunner.query(`
      CREATE TABLE "organizations" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "name" varchar(150) NOT NULL,
        CONSTRAINT "PK_organizations" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_organizations_name" UNIQUE ("name")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "organization_id" uuid,
        "role" "users_role_enum" NOT NULL,
        "name" varchar(120) NOT NULL,
        "email" varchar(150) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "last_login" TIMESTAMP,
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "FK_users_organization" FOREIGN KEY ("organization_id") REFERENCES "organizations"("id")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "idx_users_email" ON "users" ("email")`,
    );

    await queryRunner.query(`
      CREATE TABLE "attachments" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "organization_id" uuid NOT NULL,
        "content_id" varchar(255) NOT NULL,
        "content_kind" "attachments_content_kind_enum" NOT NULL,
        "locator" text NOT NULL,
        "file_name" varchar(255) NOT NULL,
        "file_size" int NOT NULL,
        "uploaded_by" uuid,
        CONSTRAINT "PK_attachments" PRIMARY KEY ("id"),
        CONSTRAINT "FK_attachments_organization" FOREIGN KEY ("organization_id") REFERENCES "organizations"("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_attachments_organization" ON "attachments" ("organization_id")`,
    );

    await queryRunner.query(`
      CREATE TABLE "orders" (
        "order_id" int NOT NULL,
        "organization_id" uuid NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "receiver_name" varchar(200) NOT NULL,
        "product" varchar(200) NOT NULL,
        "description" text NOT NULL DEFAULT '',
        "order_date" date NOT NULL,
        "expected_delivery_date" date NOT NULL,
        "quantity" int NOT NULL,
        "delivered_quantity" int NOT NULL DEFAULT 0,
        "unit_price" decimal(12,2) NOT NULL,
        "basic_price" decimal(14,2) NOT NULL,
        "gst_percent" decimal(6,2) NOT NULL,
        "total_amount_with_gst" decimal(14,2) NOT NULL,
        "advance_payment" decimal(14,2) NOT NULL DEFAULT 0,
        "pending_amount" decimal(14,2) NOT NULL,
        "status" "orders_status_enum" NOT NULL DEFAULT 'Pending',
        "created_by" uuid,
        "attachment_id" uuid,
        CONSTRAINT "PK_orders" PRIMARY KEY ("order_id", "organization_id"),
        CONSTRAINT "FK_orders_organization" FOREIGN KEY ("organization_id") REFERENCES "organizations"("id"),
        CONSTRAINT "FK_orders_attachment" FOREIGN KEY ("attachment_id") REFERENCES "attachments"("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "IDX_orders_org_order_date" ON "orders" ("organization_id", "order_date")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_orders_org_status" ON "orders" ("organization_id", "status")`,
    );

    await queryRunner.query(`
      CREATE TABLE "deliveries" (
        "order_id" int NOT NULL,
        "delivery_id" int NOT NULL,
        "organization_id" uuid NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "delivery_quantity" int NOT NULL,
        "delivery_date" date NOT NULL,
        "amount_received" decimal(14,2) NOT NULL DEFAULT 0,
        "attachment_id" uuid,
        "created_by" uuid,
        CONSTRAINT "PK_deliveries" PRIMARY KEY ("order_id", "delivery_id", "organization_id"),
        CONSTRAINT "FK_deliveries_order" FOREIGN KEY ("order_id", "organization_id") REFERENCES "orders"("order_id", "organization_id"),
        CONSTRAINT "FK_deliveries_attachment" FOREIGN KEY ("attachment_id") REFERENCES "attachments"("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "audit_logs" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "organization_id" uuid NOT NULL,
        "user_id" uuid,
        "entity_type" varchar(100) NOT NULL,
        "entity_id" varchar(100) NOT NULL,
        "action" "audit_logs_action_enum" NOT NULL,
        "changes" jsonb,
        "timestamp" TIMESTAMP NOT NULL,
        CONSTRAINT "PK_audit_logs" PRIMARY KEY ("id"),
        CONSTRAINT "FK_audit_logs_organization" FOREIGN KEY ("organization_id") REFERENCES "organizations"("id"),
        CONSTRAINT "FK_audit_logs_user" FOREIGN KEY ("user_id") REFERENCES "users"("id") ON DELETE SET NULL
      )
    `);
    await queryRunner.query(
      `CREATE INDEX "idx_audit_logs_org" ON "audit_logs" ("organization_id")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "audit_logs"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "deliveries"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "orders"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "attachments"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "organizations"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "audit_logs_action_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "attachments_content_kind_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "orders_status_enum"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "users_role_enum"`);
  }
}
