/**
 * Shared test data: a small airport config and sample feed payloads.
 */

import type { AppConfig } from "@/lib/config";

export const STATIONS_URL = "https://stations.test/feed.csv";
export const NAS_STATUS_URL = "https://nas.test/airport-status-information";
export const METAR_URL = "https://metar.test/api/data/metar";

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    statusPath: "/nonexistent/status.json",
    http: { userAgent: "test-agent/1.0", timeoutMs: 1000, retries: 0, backoffMs: 0 },
    requestPauseMs: 0,
    state: "PA",
    registrySource: "stations",
    regionBands: { westMaxLon: -78.5, centralMaxLon: -76.5 },
    weatherImpacts: true,
    metarChunkSize: 60,
    feeds: {
      stationsUrl: STATIONS_URL,
      nasStatusUrl: NAS_STATUS_URL,
      metarUrl: METAR_URL,
    },
    airports: [],
    ...overrides,
  };
}

export const STATIONS_CSV = [
  "# Station data",
  "# 5 results returned",
  "station_id,station_name,state,latitude,longitude,elevation_m",
  "KPIT,Pittsburgh Intl,PA,40.49,-80.23,367",
  "KMDT,Harrisburg Intl,PA,40.19,-76.76,94",
  'KABE,"Allentown, Lehigh Valley Intl",PA,40.65,-75.44,118',
  "ABE,Lehigh Valley duplicate,PA,40.65,-75.44,118",
  "KBWI,Baltimore-Washington Intl,MD,39.17,-76.68,45",
  "",
].join("\n");

export const NAS_STATUS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<AIRPORT_STATUS_INFORMATION>
  <Update_Time>Tue Jan 27 05:41:00 2026 GMT</Update_Time>
  <Delay_type>
    <Name>Airport Closures</Name>
    <Airport_Closure_List>
      <Airport>
        <ARPT>ABE</ARPT>
        <Reason>Snow removal</Reason>
        <Start>Jan 27 at 05:00 UTC.</Start>
        <Reopen>Jan 27 at 09:00 UTC.</Reopen>
      </Airport>
    </Airport_Closure_List>
  </Delay_type>
  <Delay_type>
    <Name>Ground Stops</Name>
    <Ground_Stop_List>
      <Program>
        <ARPT>PHL</ARPT>
        <Reason>WEATHER / LOW CEILINGS</Reason>
        <End_Time>6:30 am EST</End_Time>
      </Program>
    </Ground_Stop_List>
  </Delay_type>
  <Delay_type>
    <Name>Ground Delay Programs</Name>
    <Ground_Delay_List>
      <Ground_Delay>
        <ARPT>PHL</ARPT>
        <Reason>WEATHER / LOW CEILINGS</Reason>
        <Avg>45 minutes</Avg>
        <Max>1 hour and 30 minutes</Max>
      </Ground_Delay>
      <Ground_Delay>
        <ARPT>EWR</ARPT>
        <Reason>VOL:Volume</Reason>
        <Avg>30 minutes</Avg>
        <Max>1 hour</Max>
      </Ground_Delay>
    </Ground_Delay_List>
  </Delay_type>
  <Delay_type>
    <Name>Arrival/Departure Delay Info</Name>
    <Arrival_Departure_Delay_List>
      <Delay>
        <ARPT>PIT</ARPT>
        <Reason>VOL:Multi-taxi</Reason>
        <Arrival_Departure Type="Departure">
          <Min>16 minutes</Min>
          <Max>30 minutes</Max>
          <Trend>Increasing</Trend>
        </Arrival_Departure>
      </Delay>
    </Arrival_Departure_Delay_List>
  </Delay_type>
  <Delay_type>
    <Name>Deicing</Name>
    <Deicing_List>
      <Deicing>
        <ARPT>MDT</ARPT>
        <Start>05:00</Start>
        <Status>Active</Status>
      </Deicing>
    </Deicing_List>
  </Delay_type>
</AIRPORT_STATUS_INFORMATION>
`;

export const METAR_MDT = "KMDT 270551Z 01008KT 2SM BR OVC008 06/04 A3012";
export const METAR_PIT = "KPIT 270551Z 27008KT 10SM FEW250 M02/M08 A3021";
export const METAR_ABE = "KABE 270551Z 36012KT 1/2SM SN VV004 M01/M02 A2998";

export const METAR_FEED = [METAR_MDT, METAR_PIT, METAR_ABE, ""].join("\n");
