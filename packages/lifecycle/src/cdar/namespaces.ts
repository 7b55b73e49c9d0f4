export const CDAR_NAMESPACES = {
  rsm: 'urn:un:unece:uncefact:data:standard:CrossDomainAcknowledgementAndResponse:100',
  ram: 'urn:un:unece:uncefact:data:standard:ReusableAggregateBusinessInformationEntity:100',
  udt: 'urn:un:unece:uncefact:data:standard:UnqualifiedDataType:100',
} as const;

export const CDAR_ROOT = 'CrossDomainAcknowledgementAndResponse';

export const CDAR_GUIDELINE_ID = 'urn:factur-x.eu:1p0:cdar';

/** Acknowledgement / response document */
export const CDAR_TYPE_CODE = 'YC2';
