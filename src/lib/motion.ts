/**
 * Spring timing for CSS animations.
 *
 * A spring is described the way designers tune it: a perceptual `duration`
 * (seconds) and a `bounce` in (-1, 1). Positive bounce overshoots, zero is
 * critically damped, negative is overdamped. The step response of the
 * matching unit-mass spring is sampled into a CSS `linear()` easing whose
 * length is the time the motion takes to settle.
 */

export interface SpringTiming {
  duration: number;
  bounce: number;
}

export interface SpringEasing {
  /** CSS `linear(...)` timing function. */
  easing: string;
  durationMs: number;
}

const SNAPPY_BOUNCE = 0.15;
const SETTLE_THRESHOLD = 0.001;
const SAMPLE_COUNT = 40;

export function springTiming(duration: number, bounce = 0): SpringTiming {
  if (!(duration > 0)) {
    throw new RangeError(`Spring duration must be positive, got ${duration}`);
  }
  if (!(Math.abs(bounce) < 1)) {
    throw new RangeError(
      `Spring bounce must be between -1 and 1 (exclusive), got ${bounce}`,
    );
  }
  return { duration, bounce };
}

/** Small-bounce spring with an optional extra bounce on top of the base. */
export function snappy(duration = 0.35, extraBounce = 0): SpringTiming {
  return springTiming(duration, SNAPPY_BOUNCE + extraBounce);
}

export function dampingRatio(bounce: number): number {
  return bounce >= 0 ? 1 - bounce : 1 / (1 + bounce);
}

function angularFrequency(duration: number): number {
  return (2 * Math.PI) / duration;
}

/** Progress from 0 toward 1 at `t` seconds after release. */
export function springProgress(timing: SpringTiming, t: number): number {
  const omega = angularFrequency(timing.duration);
  const zeta = dampingRatio(timing.bounce);

  if (zeta < 1) {
    const omegaD = omega * Math.sqrt(1 - zeta * zeta);
    const envelope = Math.exp(-zeta * omega * t);
    return (
      1 -
      envelope *
        (Math.cos(omegaD * t) +
          ((zeta * omega) / omegaD) * Math.sin(omegaD * t))
    );
  }

  if (zeta === 1) {
    return 1 - Math.exp(-omega * t) * (1 + omega * t);
  }

  const root = Math.sqrt(zeta * zeta - 1);
  const slow = -omega * (zeta - root);
  const fast = -omega * (zeta + root);
  return (
    1 - (fast * Math.exp(slow * t) - slow * Math.exp(fast * t)) / (fast - slow)
  );
}

/** Seconds until the envelope falls under the settle threshold. */
export function settleTime(timing: SpringTiming): number {
  const omega = angularFrequency(timing.duration);
  const zeta = dampingRatio(timing.bounce);
  const decay =
    zeta <= 1 ? zeta * omega : omega * (zeta - Math.sqrt(zeta * zeta - 1));
  return Math.log(1 / SETTLE_THRESHOLD) / decay;
}

function formatSample(value: number): string {
  return String(Number(value.toFixed(4)));
}

export function springEasing(timing: SpringTiming): SpringEasing {
  const settle = settleTime(timing);
  const samples: string[] = [];
  for (let i = 0; i < SAMPLE_COUNT; i++) {
    const t = (settle * i) / SAMPLE_COUNT;
    samples.push(formatSample(springProgress(timing, t)));
  }
  samples.push("1");
  return {
    easing: `linear(${samples.join(", ")})`,
    durationMs: Math.round(settle * 1000),
  };
}

/** The same spring with the bounce removed. */
export function settled(timing: SpringTiming): SpringTiming {
  return springTiming(timing.duration, 0);
}

/** CSS `animation-duration` / `animation-timing-function` pair. */
export function springAnimation(timing: SpringTiming): {
  animationDuration: string;
  animationTimingFunction: string;
} {
  const { easing, durationMs } = springEasing(timing);
  return {
    animationDuration: `${durationMs}ms`,
    animationTimingFunction: easing,
  };
}

type PresenceValue = { _open: string; _closed: string };

/**
 * Presence animation props: the spring on entry, its settled curve on exit
 * so an exit never runs past its end keyframe.
 */
export function presenceAnimation(timing: SpringTiming): {
  animationDuration: PresenceValue;
  animationTimingFunction: PresenceValue;
} {
  const enter = springAnimation(timing);
  const exit = springAnimation(settled(timing));
  return {
    animationDuration: {
      _open: enter.animationDuration,
      _closed: exit.animationDuration,
    },
    animationTimingFunction: {
      _open: enter.animationTimingFunction,
      _closed: exit.animationTimingFunction,
    },
  };
}
