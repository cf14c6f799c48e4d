// services/collector/src/db/sql.ts

// epoch ms <-> timestamptz
const TS = (param: string) => `to_timestamp(${param}::double precision / 1000.0)`;
const MS = (col: string) => `ROUND(EXTRACT(EPOCH FROM ${col}) * 1000)::double precision`;

const CANDLE_COLUMNS = `
  exchange_id                 AS "exchangeId",
  pair_id                     AS "pairId",
  period_id                   AS "periodId",
  ${MS('open_time')}          AS "openTime",
  ${MS('close_time')}         AS "closeTime",
  open, high, low, close, volume,
  ${MS('fetched_at')}         AS "fetchedAt"
`;

export const SQL = {
  schema: `
    CREATE TABLE IF NOT EXISTS exchanges (
      id                      SERIAL PRIMARY KEY,
      code                    TEXT NOT NULL UNIQUE,
      name                    TEXT NOT NULL,
      environment             TEXT NOT NULL DEFAULT 'production'
                              CHECK (environment IN ('production', 'sandbox')),
      api_key                 TEXT,
      api_secret              TEXT,
      api_passphrase          TEXT,
      rate_limit_rps          DOUBLE PRECISION CHECK (rate_limit_rps > 0),
      rate_limit_concurrency  INTEGER CHECK (rate_limit_concurrency > 0),
      active                  BOOLEAN NOT NULL DEFAULT TRUE,
      created_at              TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS symbols (
      id          SERIAL PRIMARY KEY,
      code        TEXT NOT NULL UNIQUE,
      name        TEXT,
      created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
    );

    CREATE TABLE IF NOT EXISTS currency_pairs (
      id               SERIAL PRIMARY KEY,
      exchange_id      INTEGER REFERENCES exchanges(id),
      base_symbol_id   INTEGER NOT NULL REFERENCES symbols(id),
      quote_symbol_id  INTEGER NOT NULL REFERENCES symbols(id),
      active           BOOLEAN NOT NULL DEFAULT TRUE,
      created_at       TIMESTAMPTZ NOT NULL DEFAULT now()
    );
    CREATE UNIQUE INDEX IF NOT EXISTS currency_pairs_scope_uq
      ON currency_pairs (COALESCE(exchange_id, 0), base_symbol_id, quote_symbol_id);

    CREATE TABLE IF NOT EXISTS time_periods (
      id       SERIAL PRIMARY KEY,
      name     TEXT NOT NULL UNIQUE,
      minutes  INTEGER NOT NULL CHECK (minutes > 0),
      active   BOOLEAN NOT NULL DEFAULT TRUE
    );

    CREATE TABLE IF NOT EXISTS candles (
      exchange_id  INTEGER NOT NULL REFERENCES exchanges(id),
      pair_id      INTEGER NOT NULL REFERENCES currency_pairs(id),
      period_id    INTEGER NOT NULL REFERENCES time_periods(id),
      open_time    TIMESTAMPTZ NOT NULL,
      close_time   TIMESTAMPTZ NOT NULL,
      open         DOUBLE PRECISION NOT NULL,
      high         DOUBLE PRECISION NOT NULL,
      low          DOUBLE PRECISION NOT NULL,
      close        DOUBLE PRECISION NOT NULL,
      volume       DOUBLE PRECISION NOT NULL CHECK (volume >= 0),
      fetched_at   TIMESTAMPTZ NOT NULL,
      PRIMARY KEY (exchange_id, pair_id, period_id, open_time),
      CHECK (high >= GREATEST(open, close)),
      CHECK (low <= LEAST(open, close)),
      CHECK (close_time > open_time)
    );

    INSERT INTO time_periods (name, minutes) VALUES
      ('1m', 1), ('5m', 5), ('15m', 15), ('30m', 30),
      ('1h', 60), ('4h', 240), ('1d', 1440)
    ON CONFLICT (name) DO NOTHING;
  `,

  refs: {
    activeExchanges: `
      SELECT id, code, name, environment, active,
             rate_limit_rps          AS "rateLimitRps",
             rate_limit_concurrency  AS "rateLimitConcurrency",
             api_key                 AS "apiKey",
             api_secret              AS "apiSecret",
             api_passphrase          AS "apiPassphrase"
      FROM exchanges
      WHERE active = TRUE
      ORDER BY id ASC
    `,
    // pairs without an exchange are tracked everywhere
    activePairs: `
      SELECT p.id,
             p.exchange_id  AS "exchangeId",
             b.code         AS base,
             q.code         AS quote
      FROM currency_pairs p
      JOIN symbols b ON b.id = p.base_symbol_id
      JOIN symbols q ON q.id = p.quote_symbol_id
      WHERE p.active = TRUE
        AND (p.exchange_id IS NULL OR p.exchange_id = $1)
      ORDER BY p.id ASC
    `,
    activePeriods: `
      SELECT id, name, minutes
      FROM time_periods
      WHERE active = TRUE
      ORDER BY minutes ASC
    `
  },

  candles: {
    // locks the matching rows until the series transaction ends
    selectForUpdate: `
      SELECT ${CANDLE_COLUMNS}
      FROM candles
      WHERE exchange_id = $1 AND pair_id = $2 AND period_id = $3
        AND open_time = ANY (SELECT ${TS('unnest($4::double precision[])')})
      ORDER BY open_time ASC
      FOR UPDATE
    `,
    insertBatch: `
      WITH rows AS (
        SELECT
          unnest($4::double precision[])  AS open_ms,
          unnest($5::double precision[])  AS close_ms,
          unnest($6::double precision[])  AS open,
          unnest($7::double precision[])  AS high,
          unnest($8::double precision[])  AS low,
          unnest($9::double precision[])  AS close,
          unnest($10::double precision[]) AS volume,
          unnest($11::double precision[]) AS fetched_ms
      )
      INSERT INTO candles (exchange_id, pair_id, period_id, open_time, close_time,
                           open, high, low, close, volume, fetched_at)
      SELECT $1, $2, $3, ${TS('open_ms')}, ${TS('close_ms')},
             open, high, low, close, volume, ${TS('fetched_ms')}
      FROM rows
      ON CONFLICT (exchange_id, pair_id, period_id, open_time) DO NOTHING
      RETURNING ${MS('open_time')} AS "openTime"
    `,
    updateBatch: `
      UPDATE candles c SET
        open       = r.open,
        high       = r.high,
        low        = r.low,
        close      = r.close,
        volume     = r.volume,
        fetched_at = ${TS('r.fetched_ms')}
      FROM (
        SELECT
          unnest($4::double precision[])  AS open_ms,
          unnest($5::double precision[])  AS open,
          unnest($6::double precision[])  AS high,
          unnest($7::double precision[])  AS low,
          unnest($8::double precision[])  AS close,
          unnest($9::double precision[])  AS volume,
          unnest($10::double precision[]) AS fetched_ms
      ) r
      WHERE c.exchange_id = $1 AND c.pair_id = $2 AND c.period_id = $3
        AND c.open_time = ${TS('r.open_ms')}
    `,
    // end of the gap-free run of final candles that starts exactly at $4
    contiguousRunEnd: `
      WITH run AS (
        SELECT open_time,
               LEAD(open_time) OVER (ORDER BY open_time) AS next_open
        FROM candles
        WHERE exchange_id = $1 AND pair_id = $2 AND period_id = $3
          AND open_time >= ${TS('$4')}
          AND fetched_at >= close_time
      ),
      breaks AS (
        SELECT open_time
        FROM run
        WHERE next_open IS NULL
           OR next_open <> open_time + $5::bigint * interval '1 millisecond'
      )
      SELECT ${MS('MIN(b.open_time)')} AS "openTime"
      FROM breaks b
      WHERE EXISTS (SELECT 1 FROM run WHERE open_time = ${TS('$4')})
    `
  },

  stats: {
    totals: `
      SELECT
        (SELECT COUNT(*) FROM candles)::double precision         AS "totalCandles",
        (SELECT COUNT(*) FROM exchanges)::double precision       AS "totalExchanges",
        (SELECT COUNT(*) FROM currency_pairs)::double precision  AS "totalPairs",
        (SELECT COUNT(*) FROM time_periods)::double precision    AS "totalPeriods"
    `,
    latestPerExchange: `
      SELECT e.name AS exchange, MAX(c.fetched_at) AS "lastUpdate"
      FROM candles c
      JOIN exchanges e ON e.id = c.exchange_id
      GROUP BY e.id, e.name
      ORDER BY "lastUpdate" DESC
    `
  },

  ping: 'SELECT 1 AS ok'
} as const;
