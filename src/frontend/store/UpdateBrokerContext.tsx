/* ------------------------------------------------------------------ */
/*  Page-scoped UpdateBroker, provided through React context.          */
/*  The broker lives as long as the provider; unmounting releases      */
/*  every subscription and the server socket.                          */
/* ------------------------------------------------------------------ */

import { createContext, useContext, useEffect, useState, type ReactNode } from 'react';
import { UpdateBroker } from '../realtime/update-broker.js';
import { connect } from '../realtime/socket.js';

const UpdateBrokerContext = createContext<UpdateBroker | null>(null);

export function UpdateBrokerProvider({
  children,
  liveUpdates = true,
}: {
  children: ReactNode;
  liveUpdates?: boolean;
}) {
  const [broker] = useState(() => new UpdateBroker());

  useEffect(() => {
    const disconnect = liveUpdates ? connect(broker) : null;
    return () => {
      disconnect?.();
      broker.close();
    };
  }, [broker, liveUpdates]);

  return (
    <UpdateBrokerContext.Provider value={broker}>
      {children}
    </UpdateBrokerContext.Provider>
  );
}

export function useUpdateBroker(): UpdateBroker {
  const broker = useContext(UpdateBrokerContext);
  if (!broker) throw new Error('useUpdateBroker must be used inside UpdateBrokerProvider');
  return broker;
}
