export const MODULE_IDS = Object.freeze({
  scaleEngine: 'ScaleEngine',
  responsiveScaler: 'ResponsiveScaler',
});
