// Hyland-Wexler saturation pressure, ASHRAE Fundamentals chapter 1.

const WATER_AIR_MOLAR_RATIO = 0.621945;
const TRIPLE_POINT_K = 273.15;

const OVER_ICE = [-5.6745359e3, 6.3925247, -9.677843e-3, 6.2215701e-7, 2.0747825e-9, -9.484024e-13, 4.1635019];

const OVER_WATER = [-5.8002206e3, 1.3914993, -4.8640239e-2, 4.1764768e-5, -1.4452093e-8, 6.5459673];

/** Saturation vapour pressure of water in Pa at `temperature` K. */
export const saturationPressure = (temperature: number): number => {
  const t = temperature;
  if (t < TRIPLE_POINT_K) {
    const [c1, c2, c3, c4, c5, c6, c7] = OVER_ICE;
    return Math.exp(c1 / t + c2 + c3 * t + c4 * t ** 2 + c5 * t ** 3 + c6 * t ** 4 + c7 * Math.log(t));
  }
  const [c8, c9, c10, c11, c12, c13] = OVER_WATER;
  return Math.exp(c8 / t + c9 + c10 * t + c11 * t ** 2 + c12 * t ** 3 + c13 * Math.log(t));
};

export const humidityRatio = (
  pressure: number,
  temperature: number,
  relativeHumidity: number
): number => {
  const vapourPressure = relativeHumidity * saturationPressure(temperature);
  return (WATER_AIR_MOLAR_RATIO * vapourPressure) / (pressure - vapourPressure);
};
