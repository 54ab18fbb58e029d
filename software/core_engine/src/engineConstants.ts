// engineConstants.ts
// Default operating parameters for the entropy pipeline, bit collector and HRV monitor.
// Every component merges its Partial<Config> over these values.

export const ENGINE_CONSTANTS = {
  // Bit collection cadence and buffers
  COLLECTOR: {
    BUFFER_CAPACITY: 100_000,     // bits per buffer (~16 min at 100 Hz)
    INTERVAL_MS: 10,              // one bit every 10ms
    STOP_TIMEOUT_MS: 1000,        // bounded join on stop()
    STATS_WINDOW: 1000,           // trailing window for mean / z-score
    MIN_BITS_FOR_STATS: 10,       // below this, stats are neutral
    MIN_BITS_FOR_COMPARISON: 100, // per buffer
    CONTINUOUS_RETRY_DELAY_MS: 500,
    CONTINUOUS_POLL_MS: 0,        // yield to the event loop between blocks
  },

  // Software-defined radio sampling (RTL-SDR class dongles)
  SPECTRAL: {
    SAMPLE_RATE_HZ: 2.4e6,
    CENTER_FREQUENCY_HZ: 100e6,
    GAIN: 'auto',
    SAMPLES_PER_HASH: 65_536,
    MAX_CYCLES: 64,               // 64 x 32-byte digests = 2 KiB per request
    FAILURE_THRESHOLD: 3,
    COOLDOWN_BASE_MS: 30_000,
    COOLDOWN_MAX_MS: 300_000,
  },

  // Remote quantum RNG (ANU QRNG JSON API)
  ONLINE: {
    ENDPOINT: 'https://qrng.anu.edu.au/API/jsonI.php',
    MAX_CHUNK_BYTES: 1024,
    TIMEOUT_MS: 5000,
    CHUNK_DELAY_MS: 50,
  },

  // BLE heart-rate monitoring
  MONITOR: {
    SCAN_TIMEOUT_MS: 10_000,
    CONNECT_TIMEOUT_MS: 10_000,
    MAX_RETRIES: 3,
    FLAKY_MAX_RETRIES: 6,
    RETRY_BASE_DELAY_MS: 2000,
    RETRY_MAX_DELAY_MS: 15_000,
    LIVENESS_POLL_MS: 1000,
    STOP_TIMEOUT_MS: 2000,
    RR_BUFFER_SIZE: 120,          // ~2 minutes of beats
    SAMPLE_QUEUE_CAPACITY: 1000,
  },

  // RMSSD -> coherence mapping
  COHERENCE: {
    MIN_RR_SAMPLES: 10,
    NORMALIZATION_MS: 50,         // coherence = 1 / (1 + RMSSD / k)
  },

  RECORDER: {
    SNAPSHOT_CAPACITY: 10_000,
  },

  SESSION: {
    AUTO_MARK_THRESHOLD: 0.8,
    AUTO_MARK_COOLDOWN_MS: 1000,
    EXPORT_BIT_LIMIT: 10_000,
    DRBG_SEED_BYTES: 32,
    SPECTRAL_BLOCK_BYTES: 256,
  },
} as const;
