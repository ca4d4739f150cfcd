import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Users, plans and payment transactions.
 *
 * The unique index on `payment_transactions.reference` backs the
 * once-per-reference subscription grant.
 */
export class InitialSchema1729000000000 implements MigrationInterface {
  name = 'InitialSchema1729000000000';

  async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS users (
        id                  UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        username            VARCHAR(50)  NOT NULL,
        email               VARCHAR(100) NOT NULL,
        first_name          VARCHAR(50)  NOT NULL,
        last_name           VARCHAR(50)  NOT NULL,
        phone_number        VARCHAR(20)  NOT NULL,
        password_hash       VARCHAR      NOT NULL,
        is_admin            BOOLEAN      NOT NULL DEFAULT FALSE,
        is_subscribed       BOOLEAN      NOT NULL DEFAULT FALSE,
        subscription_expiry TIMESTAMPTZ,
        reset_token         VARCHAR,
        avatar_url          VARCHAR,
        username_changed_at TIMESTAMPTZ,
        created_at          TIMESTAMPTZ  NOT NULL DEFAULT now(),
        updated_at          TIMESTAMPTZ
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS uq_users_username ON users (username)`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS uq_users_email ON users (email)`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_users_created_at ON users (created_at)`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS subscription_plans (
        id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name          VARCHAR(100)   NOT NULL,
        description   TEXT           NOT NULL,
        price         NUMERIC(12, 2) NOT NULL CHECK (price >= 0),
        currency      VARCHAR(3)     NOT NULL DEFAULT 'MWK',
        duration_days INTEGER        NOT NULL CHECK (duration_days > 0),
        is_active     BOOLEAN        NOT NULL DEFAULT TRUE,
        created_at    TIMESTAMPTZ    NOT NULL DEFAULT now(),
        updated_at    TIMESTAMPTZ
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS payment_transactions (
        id            UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        reference     VARCHAR(64)    NOT NULL,
        user_id       UUID           NOT NULL REFERENCES users (id) ON DELETE CASCADE,
        plan_id       UUID           NOT NULL REFERENCES subscription_plans (id) ON DELETE RESTRICT,
        amount        NUMERIC(12, 2) NOT NULL,
        currency      VARCHAR(3)     NOT NULL,
        duration_days INTEGER        NOT NULL CHECK (duration_days > 0),
        status        VARCHAR(16)    NOT NULL DEFAULT 'pending',
        provider      VARCHAR(32)    NOT NULL,
        checkout_url  VARCHAR,
        created_at    TIMESTAMPTZ    NOT NULL DEFAULT now(),
        completed_at  TIMESTAMPTZ
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS uq_payment_transactions_reference ON payment_transactions (reference)`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS idx_payment_transactions_user_id ON payment_transactions (user_id)`,
    );
  }

  async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS payment_transactions`);
    await queryRunner.query(`DROP TABLE IF EXISTS subscription_plans`);
    await queryRunner.query(`DROP TABLE IF EXISTS users`);
  }
}
